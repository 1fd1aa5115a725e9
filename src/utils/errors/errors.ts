// src/utils/errors/errors.ts

/**
 * Base class for every failure raised by the conversion pipeline.
 */
export class GlyphMosaicError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Options rejected before any image work starts.
 */
export class InvalidConfigurationError extends GlyphMosaicError {}

/**
 * The source image could not be read or decoded.
 */
export class DecodeError extends GlyphMosaicError {}

/**
 * Raised for states the pipeline should never reach, such as an empty tile histogram.
 */
export class InternalInvariantViolationError extends GlyphMosaicError {}
