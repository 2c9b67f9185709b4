/**
 * Error taxonomy for the catalog engine.
 *
 * Non-fatal scan problems are not errors: they are returned as
 * ReconciliationWarning records in the initialization report.
 */

export class BudgetWorkbenchError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Malformed or incomplete configuration. Aborts model construction and
 * initialization.
 */
export class ConfigurationError extends BudgetWorkbenchError {}

/**
 * A required folder, workbook or cached content is absent.
 */
export class NotFoundError extends BudgetWorkbenchError {
    readonly target: string;

    constructor(target: string, message: string, options?: ErrorOptions) {
        super(message, options);
        this.target = target;
    }
}

export type KeyKind = 'fi' | 'workflow' | 'purpose';

/**
 * Unknown FI / workflow / purpose key, or the "all" sentinel used where a
 * concrete key is required.
 */
export class KeyNotFoundError extends BudgetWorkbenchError {
    readonly kind: KeyKind;
    readonly key: string;

    constructor(kind: KeyKind, key: string, message?: string) {
        super(message ?? `Unknown ${kind} key: '${key}'`);
        this.kind = kind;
        this.key = key;
    }
}

/**
 * Wrapped filesystem failure. The original error is kept as `cause`.
 */
export class StorageIOError extends BudgetWorkbenchError {
    readonly path: string;

    constructor(path: string, message: string, options?: ErrorOptions) {
        super(message, options);
        this.path = path;
    }
}

/**
 * Message of any thrown value.
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
