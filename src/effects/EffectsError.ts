/**
 * Several effects failed together, e.g. a primary call and its fallback.
 * The message joins every underlying message; the errors stay inspectable.
 */
export class EffectsError extends Error {
    readonly errors: readonly Error[];

    constructor(errors: Error[]) {
        super(errors.map(e => e.message).join('; '));
        this.name = 'EffectsError';
        this.errors = errors;
    }
}
