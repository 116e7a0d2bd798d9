// Deployment modules for a local chain.
// A module has an id and a deploy step that takes the shared deployment
// context plus its own parameters, and returns what it deployed.

import type { Address } from 'viem';

import type { LocalChain } from '../local/LocalChain';
import type { PriceOracle } from '../oracle/PriceOracleClient';
import type { Logger } from '../runtime/logger';

export interface DeployContext {
    readonly chain: LocalChain;
    readonly deployer: Address;
    readonly oracle: PriceOracle;
    readonly logger: Logger;
}

export interface DeployModule<P, R> {
    readonly id: string;
    deploy(context: DeployContext, params: P): Promise<R>;
}

export function buildModule<P, R>(
    id: string,
    deploy: (context: DeployContext, params: P) => Promise<R>,
): DeployModule<P, R> {
    return {
        id,
        async deploy(context: DeployContext, params: P): Promise<R> {
            const log: Logger = context.logger.child(id);
            log.info('Deploying');
            const result: R = await deploy({ ...context, logger: log }, params);
            log.info('Deployed');
            return result;
        },
    };
}
