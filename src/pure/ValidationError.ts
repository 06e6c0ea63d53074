import {NonEmptyList} from 'purify-ts';

export class ValidationError extends Error {
    readonly problems: readonly string[];

    constructor(problems: NonEmptyList<string>) {
        super(problems.join('; '));
        this.name = 'ValidationError';
        this.problems = [...problems];
    }
}
