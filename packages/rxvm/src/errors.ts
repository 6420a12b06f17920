export class RxvmError extends Error {
    readonly code: string

    constructor(message: string, code = 'RXVM_ERROR', options?: { cause?: unknown }) {
        super(`[rxvm] ${message}`, options)
        this.name = 'RxvmError'
        this.code = code
    }
}

export class ServiceResolutionError extends RxvmError {
    constructor(
        message: string,
        public readonly key: string,
        public readonly contract?: string,
    ) {
        super(message, 'SERVICE_RESOLUTION_ERROR')
        this.name = 'ServiceResolutionError'
    }
}

export class PropertyExpressionError extends RxvmError {
    constructor(message: string) {
        super(message, 'PROPERTY_EXPRESSION_ERROR')
        this.name = 'PropertyExpressionError'
    }
}

/**
 * Wraps an error nobody observed. Raised by the default exception handler
 * so that a failure without a `thrownExceptions` subscriber is not lost.
 */
export class UnhandledErrorException extends RxvmError {
    constructor(public readonly inner: unknown) {
        super(`An object implementing thrownExceptions got an error nobody handled: ${describeError(inner)}`, 'UNHANDLED_ERROR', {
            cause: inner,
        })
        this.name = 'UnhandledErrorException'
    }
}

export class UnhandledInteractionError<Input> extends RxvmError {
    constructor(public readonly input: Input) {
        super('Failed to find a registration for an interaction', 'UNHANDLED_INTERACTION')
        this.name = 'UnhandledInteractionError'
    }
}

export class BindingError extends RxvmError {
    constructor(message: string) {
        super(message, 'BINDING_ERROR')
        this.name = 'BindingError'
    }
}

export class ViewLocationError extends RxvmError {
    constructor(message: string) {
        super(message, 'VIEW_LOCATION_ERROR')
        this.name = 'ViewLocationError'
    }
}

export function toError(error: unknown): Error {
    if (error instanceof Error) {
        return error
    } else {
        return new Error(String(error))
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}
