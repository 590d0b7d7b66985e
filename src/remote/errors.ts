export class RemoteError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'RemoteError';
    }
}

export class AuthenticationError extends RemoteError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'AuthenticationError';
    }
}

export class NotAuthenticatedError extends RemoteError {
    constructor() {
        super('Not authenticated: call authenticate() before any other remote call');
        this.name = 'NotAuthenticatedError';
    }
}

/**
 * The server answered with a fault or an unexpected payload
 */
export class RemoteCallError extends RemoteError {
    readonly model?: string;
    readonly method: string;

    constructor(method: string, message: string, model?: string, options?: ErrorOptions) {
        super(`${model ? `${model}.` : ''}${method}: ${message}`, options);
        this.name = 'RemoteCallError';
        this.method = method;
        this.model = model;
    }
}
