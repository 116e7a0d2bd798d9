/**
 * Deployment configuration, read from the environment (and `.env`).
 *
 * Addresses are checksummed, times are unix seconds, amounts are whole
 * tokens. Every failing variable is reported at once in a ConfigError.
 */

import * as dotenv from 'dotenv';
import { getAddress, isAddress, type Address } from 'viem';
import { z } from 'zod';

import { isLogLevel, type LogLevel } from '../runtime/logger';

export const DEFAULT_MAX_PURCHASE_LIMIT: bigint = 10_000_000n;
export const DEFAULT_TOKEN_CAP: bigint = 10_000_000_000n;

export class ConfigError extends Error {
    public constructor(public readonly issues: ReadonlyArray<string>) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

// ── Field schemas ──

const blankAsUndefined = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const address = z
    .string()
    .trim()
    .refine((value: string) => isAddress(value, { strict: false }), 'must be a 20-byte hex address')
    .transform((value: string): Address => getAddress(value));

/**
 * Whole-number string to bigint. Failures are fatal so later checks never
 * see the raw string.
 */
function integer(positiveOnly: boolean) {
    return z
        .string()
        .trim()
        .transform((value: string, ctx: z.RefinementCtx): bigint => {
            if (!/^\d+$/.test(value)) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a non-negative integer', fatal: true });
                return z.NEVER;
            }
            const parsed: bigint = BigInt(value);
            if (positiveOnly && parsed === 0n) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be > 0', fatal: true });
                return z.NEVER;
            }
            return parsed;
        });
}

const unsigned = integer(false);
const positive = integer(true);

const decimals = unsigned.transform((value: bigint, ctx: z.RefinementCtx): number => {
    if (value > 36n) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be at most 36', fatal: true });
        return z.NEVER;
    }
    return Number(value);
});

const logLevel = z
    .string()
    .trim()
    .toLowerCase()
    .refine(isLogLevel, 'must be one of debug, info, warn, error');

const EnvSchema = z
    .object({
        TOKEN_ADDRESS: z.preprocess(blankAsUndefined, address.optional()),
        DEFAULT_TOKEN_ADDRESS: z.preprocess(blankAsUndefined, address),
        TREASURY_ADDRESS: z.preprocess(blankAsUndefined, address.optional()),
        START_TIME: z.preprocess(blankAsUndefined, unsigned),
        END_TIME: z.preprocess(blankAsUndefined, unsigned),
        MAX_PURCHASE_LIMIT: z.preprocess(blankAsUndefined, positive.optional()),
        TOKEN_NAME: z.preprocess(blankAsUndefined, z.string().optional()),
        TOKEN_SYMBOL: z.preprocess(blankAsUndefined, z.string().optional()),
        TOKEN_CAP: z.preprocess(blankAsUndefined, positive.optional()),
        TOKEN_DECIMALS: z.preprocess(blankAsUndefined, decimals.optional()),
        SALE_LOG_LEVEL: z.preprocess(blankAsUndefined, logLevel.optional()),
        SALE_LOG_JSON: z.preprocess(blankAsUndefined, z.enum(['0', '1']).optional()),
    })
    .refine((env) => env.START_TIME < env.END_TIME, {
        message: 'START_TIME must be before END_TIME',
        path: ['END_TIME'],
    });

// ── Config ──

export interface TokenConfig {
    readonly name: string;
    readonly symbol: string;
    /** Whole tokens. */
    readonly cap: bigint;
    readonly decimals: number;
}

export interface SaleConfig {
    /** Existing sale token; when absent the token module deploys one. */
    readonly tokenAddress?: Address;
    readonly defaultTokenAddress: Address;
    /** Falls back to the deployer. */
    readonly treasuryAddress?: Address;
    readonly startTime: bigint;
    readonly endTime: bigint;
    readonly maxPurchaseLimit: bigint;
}

export interface AppConfig {
    readonly token: TokenConfig;
    readonly sale: SaleConfig;
    readonly logLevel: LogLevel;
    readonly logJson: boolean;
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue: z.ZodIssue) => `${issue.path.join('.') || 'env'}: ${issue.message}`),
        );
    }

    const vars = parsed.data;
    return {
        token: {
            name: vars.TOKEN_NAME ?? 'Sale Token',
            symbol: vars.TOKEN_SYMBOL ?? 'SALE',
            cap: vars.TOKEN_CAP ?? DEFAULT_TOKEN_CAP,
            decimals: vars.TOKEN_DECIMALS ?? 18,
        },
        sale: {
            tokenAddress: vars.TOKEN_ADDRESS,
            defaultTokenAddress: vars.DEFAULT_TOKEN_ADDRESS,
            treasuryAddress: vars.TREASURY_ADDRESS,
            startTime: vars.START_TIME,
            endTime: vars.END_TIME,
            maxPurchaseLimit: vars.MAX_PURCHASE_LIMIT ?? DEFAULT_MAX_PURCHASE_LIMIT,
        },
        logLevel: vars.SALE_LOG_LEVEL ?? 'info',
        logJson: vars.SALE_LOG_JSON === '1',
    };
}

/**
 * Loads `.env` from the working directory (existing variables win) and
 * parses the result.
 */
export function loadConfig(path?: string): AppConfig {
    dotenv.config({ path });
    return parseConfig(process.env);
}
