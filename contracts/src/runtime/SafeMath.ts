// Checked u256 arithmetic over bigint. Division truncates toward zero.

import { ArithmeticError } from './Revert';

export const U256_MAX: bigint = (1n << 256n) - 1n;

function checked(value: bigint, op: string): bigint {
    if (value < 0n) throw new ArithmeticError(`SafeMath: ${op} underflow`);
    if (value > U256_MAX) throw new ArithmeticError(`SafeMath: ${op} overflow`);
    return value;
}

export const SafeMath = {
    add(a: bigint, b: bigint): bigint {
        return checked(a + b, 'addition');
    },

    sub(a: bigint, b: bigint): bigint {
        return checked(a - b, 'subtraction');
    },

    mul(a: bigint, b: bigint): bigint {
        return checked(a * b, 'multiplication');
    },

    div(a: bigint, b: bigint): bigint {
        if (b === 0n) throw new ArithmeticError('SafeMath: division by zero');
        return checked(a / b, 'division');
    },

    /**
     * 10^exponent as a u256. Exponents come from token and feed decimals.
     */
    pow10(exponent: number): bigint {
        if (!Number.isInteger(exponent) || exponent < 0) {
            throw new ArithmeticError(`SafeMath: invalid exponent ${exponent}`);
        }
        return checked(10n ** BigInt(exponent), 'exponentiation');
    },
} as const;
