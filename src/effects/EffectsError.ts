export class EffectsError extends Error {
    readonly errors: readonly Error[];

    constructor(errors: Error[]) {
        super(errors.map(e => e.message).join('; '));
        this.name = 'EffectsError';
        this.errors = errors;
    }
}
