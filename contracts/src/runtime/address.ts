import { getAddress, isAddress, isAddressEqual, zeroAddress, type Address } from 'viem';

import { ValidationError } from './Revert';

export function isZero(address: Address): boolean {
    return isAddressEqual(address, zeroAddress);
}

/**
 * Checksum form of `value`. Rejects malformed input and, unless `allowZero`
 * is set, the zero address.
 */
export function requireAddress(value: string, label: string, allowZero: boolean = false): Address {
    if (!isAddress(value, { strict: false })) {
        throw new ValidationError('InvalidAddress', `Invalid ${label} address`);
    }
    const address: Address = getAddress(value);
    if (!allowZero && isZero(address)) {
        throw new ValidationError('ZeroAddress', `Invalid ${label}: zero address`);
    }
    return address;
}

export function sameAddress(a: Address, b: Address): boolean {
    return isAddressEqual(a, b);
}
