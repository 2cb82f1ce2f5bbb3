export class PipelineError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
    }
}

export class ConfigurationError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class ValidationError extends PipelineError {
    readonly code: string;

    constructor(message: string, code = 'validation_failed', options?: ErrorOptions) {
        super(message, options);
        this.code = code;
    }
}

/** Transport failure, timeout or non-success status from an external stage service. */
export class AdapterError extends PipelineError {
    readonly status?: number;

    constructor(message: string, options?: ErrorOptions & { status?: number }) {
        super(message, options);
        this.status = options?.status;
    }
}

export class MalformedResponseError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class StorageError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class JobNotFoundError extends PipelineError {
    readonly jobId: string;

    constructor(jobId: string, options?: ErrorOptions) {
        super(`Job not found: ${jobId}`, options);
        this.jobId = jobId;
    }
}

export class ArtifactNotFoundError extends PipelineError {
    constructor(jobId: string, name: string, options?: ErrorOptions) {
        super(`Artifact not found: ${jobId}/${name}`, options);
    }
}
