export class DescriptionError extends Error {
    constructor(public readonly field: string, detail: string) {
        super(`${field}: ${detail}`);
        this.name = 'DescriptionError';
    }
}

export class TreeValidationError extends Error {
    constructor(public readonly violations: readonly string[]) {
        super('Validation failed:\n- ' + violations.join('\n- '));
        this.name = 'TreeValidationError';
    }
}

export class LayoutConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'LayoutConfigError';
    }
}
