/**
 * Raised by loaders when an input file cannot be read or parsed.
 */
export class LoaderError extends Error {
    constructor(
        message: string,
        public readonly path: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'LoaderError';
    }
}
