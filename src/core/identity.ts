import { Identity } from '../types';
import { InvalidArgument } from '../errors';
import { HOOK_CONSTANTS } from '../config/constants';

const IDENTITY_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export function isIdentity(value: string): boolean {
    return IDENTITY_PATTERN.test(value);
}

export function isZeroIdentity(identity: Identity): boolean {
    return identity.toLowerCase() === HOOK_CONSTANTS.ZERO_IDENTITY;
}

/**
 * Lower-case a well-formed identity. Throws InvalidArgument otherwise.
 */
export function normalizeIdentity(value: string, field: string = 'identity'): Identity {
    if (!isIdentity(value)) {
        throw new InvalidArgument(`${field} is not a valid identity`, { field, value });
    }
    return value.toLowerCase();
}

/**
 * Like normalizeIdentity, but also rejects the null identity.
 */
export function requireNonZeroIdentity(value: string, field: string = 'identity'): Identity {
    const identity = normalizeIdentity(value, field);
    if (isZeroIdentity(identity)) {
        throw new InvalidArgument(`${field} must not be the null identity`, { field });
    }
    return identity;
}

/**
 * Shorten an identity for log lines: 0x1234abcd...
 */
export function shortId(identity: Identity): string {
    return `${identity.slice(0, 10)}...`;
}
