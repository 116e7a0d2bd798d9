import type { TokenConfig } from '../config/env';
import type { CappedToken } from '../token/CappedToken';
import { SafeMath } from '../runtime/SafeMath';
import { buildModule, type DeployContext } from './DeployModule';

export interface TokenModuleResult {
    readonly token: CappedToken;
}

/**
 * Deploys the capped sale token owned by the deployer and mints the whole
 * cap to it.
 */
export const TokenModule = buildModule(
    'TokenModule',
    async (context: DeployContext, config: TokenConfig): Promise<TokenModuleResult> => {
        const token: CappedToken = context.chain.deployToken({
            owner: context.deployer,
            name: config.name,
            symbol: config.symbol,
            decimals: config.decimals,
            cap: config.cap,
        });

        const supply: bigint = SafeMath.mul(config.cap, SafeMath.pow10(config.decimals));
        token.mint(context.deployer, context.deployer, supply);

        context.logger.info('Token deployed', { address: token.address, symbol: token.symbol, supply });
        return { token };
    },
);
