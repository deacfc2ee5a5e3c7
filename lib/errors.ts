// Base class for every error raised by the orchestrator
export class ImagesmithError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ImagesmithError';
    }
}

// --- Structural errors: the whole run fails before any build starts

export class DuplicateNameError extends ImagesmithError {
    constructor(public readonly unit: string) {
        super(`Unit '${unit}' is already registered`);
        this.name = 'DuplicateNameError';
    }
}

export class UnknownUnitError extends ImagesmithError {
    constructor(public readonly unit: string) {
        super(`Unknown unit '${unit}'`);
        this.name = 'UnknownUnitError';
    }
}

export class DanglingReferenceError extends ImagesmithError {
    constructor(
        public readonly unit: string,
        public readonly missing: string,
    ) {
        super(`Unit '${unit}' requires '${missing}', which is not defined`);
        this.name = 'DanglingReferenceError';
    }
}

export class CyclicDependencyError extends ImagesmithError {
    /**
     * @param path units along the cycle, the first one repeated at the end
     */
    constructor(public readonly path: readonly string[]) {
        super(`Dependency cycle: ${path.join(' -> ')}`);
        this.name = 'CyclicDependencyError';
    }
}

export class ConflictingBaseError extends ImagesmithError {
    constructor(
        public readonly unit: string,
        public readonly bases: readonly string[],
    ) {
        super(
            `Unit '${unit}' inherits conflicting base images: ${bases.join(', ')}`,
        );
        this.name = 'ConflictingBaseError';
    }
}

export class MissingBaseError extends ImagesmithError {
    constructor(public readonly unit: string) {
        super(
            `Unit '${unit}' has no base image: declare FROM on it or on a unit it requires`,
        );
        this.name = 'MissingBaseError';
    }
}

export class ManifestError extends ImagesmithError {
    constructor(
        public readonly source: string,
        public readonly issues: readonly string[],
    ) {
        super(`Invalid manifest ${source}:\n  ${issues.join('\n  ')}`);
        this.name = 'ManifestError';
    }
}

export class ConfigError extends ImagesmithError {
    constructor(public readonly issues: readonly string[]) {
        super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
        this.name = 'ConfigError';
    }
}

// --- Unit-local errors: contained to one unit and its dependents

export class UnreadableFileError extends ImagesmithError {
    constructor(
        public readonly path: string,
        cause?: unknown,
    ) {
        super(`Cannot read build context file ${path}`, { cause });
        this.name = 'UnreadableFileError';
    }
}

export class BuildError extends ImagesmithError {
    constructor(
        public readonly unit: string,
        message: string,
        cause?: unknown,
    ) {
        super(`Build of '${unit}' failed: ${message}`, { cause });
        this.name = 'BuildError';
    }
}

export class BuildTimeoutError extends BuildError {
    constructor(
        unit: string,
        public readonly timeoutMs: number,
    ) {
        super(unit, `timed out after ${timeoutMs}ms`);
        this.name = 'BuildTimeoutError';
    }
}

export class RecordStoreError extends ImagesmithError {
    constructor(
        public readonly unit: string,
        cause?: unknown,
    ) {
        super(`Failed to write build record for '${unit}'`, { cause });
        this.name = 'RecordStoreError';
    }
}

/**
 * Errors that invalidate the whole manifest; reported before anything is built.
 */
export function isStructuralError(error: unknown): error is ImagesmithError {
    return (
        error instanceof DuplicateNameError ||
        error instanceof UnknownUnitError ||
        error instanceof DanglingReferenceError ||
        error instanceof CyclicDependencyError ||
        error instanceof ConflictingBaseError ||
        error instanceof MissingBaseError ||
        error instanceof ManifestError ||
        error instanceof ConfigError
    );
}
