/**
 * Hook Error Taxonomy
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every failure raised by the hook is a HookError with a stable code.
 * Failures are terminal for the triggering event and leave no partial state.
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 *   UNAUTHORIZED      caller is not the admin
 *   INVALID_ARGUMENT  malformed configuration or identity input
 *   OUT_OF_RANGE      price snapshot outside the engine's valid bounds
 *   ARITHMETIC        degenerate price, zero divisor or fee overflow
 *   FORBIDDEN         actor lacks the capability for the requested action
 */

export type HookErrorCode =
    | 'UNAUTHORIZED'
    | 'INVALID_ARGUMENT'
    | 'OUT_OF_RANGE'
    | 'ARITHMETIC'
    | 'FORBIDDEN';

export type ErrorContext = Record<string, string | number | boolean | null>;

export class HookError extends Error {
    constructor(
        public readonly code: HookErrorCode,
        public readonly reason: string,
        public readonly context: ErrorContext = {}
    ) {
        super(`[${code}] ${reason}`);
        this.name = 'HookError';
    }
}

export class Unauthorized extends HookError {
    constructor(reason: string, context?: ErrorContext) {
        super('UNAUTHORIZED', reason, context);
        this.name = 'Unauthorized';
    }
}

export class InvalidArgument extends HookError {
    constructor(reason: string, context?: ErrorContext) {
        super('INVALID_ARGUMENT', reason, context);
        this.name = 'InvalidArgument';
    }
}

export class OutOfRange extends HookError {
    constructor(reason: string, context?: ErrorContext) {
        super('OUT_OF_RANGE', reason, context);
        this.name = 'OutOfRange';
    }
}

export class ArithmeticError extends HookError {
    constructor(reason: string, context?: ErrorContext) {
        super('ARITHMETIC', reason, context);
        this.name = 'ArithmeticError';
    }
}

export class Forbidden extends HookError {
    constructor(reason: string, context?: ErrorContext) {
        super('FORBIDDEN', reason, context);
        this.name = 'Forbidden';
    }
}

/**
 * Narrow an unknown thrown value to a HookError, optionally of a given code.
 */
export function isHookError(value: unknown, code?: HookErrorCode): value is HookError {
    if (!(value instanceof HookError)) return false;
    return code === undefined || value.code === code;
}
