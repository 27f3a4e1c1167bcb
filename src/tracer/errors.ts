/**
 * Programmer errors: a value of the wrong kind reached an operation that
 * cannot accept it. These are raised at the point of misuse and never
 * caught inside the engine.
 */
export class PreconditionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PreconditionError';
    }
}

/** A material was constructed with a negative coefficient. */
export class MaterialError extends PreconditionError {
    constructor(public field: string, public value: number) {
        super(`Material ${field} must be non-negative, received ${value}`);
        this.name = 'MaterialError';
    }
}

/** Unrecoverable input in a scene file or OBJ mesh. */
export class ParseError extends Error {
    constructor(
        message: string,
        public line: number,
        public source: string
    ) {
        super([message, `at line ${line}`, '', `    ${source}`, ''].join('\n'));
        this.name = 'ParseError';
    }
}

export function precondition(condition: boolean, message: string): asserts condition {
    if (!condition) throw new PreconditionError(message);
}
