import type { Address } from 'viem';

import type { SaleConfig, TokenConfig } from '../config/env';
import { CrowdSaleContract } from '../crowdsale/CrowdSaleContract';
import { ExternalCallError } from '../runtime/Revert';
import { SafeMath } from '../runtime/SafeMath';
import type { TokenLedger } from '../runtime/Chain';
import { buildModule, type DeployContext } from './DeployModule';
import { TokenModule } from './TokenModule';

export interface CrowdSaleModuleParams {
    readonly sale: SaleConfig;
    /** Used only when `sale.tokenAddress` is absent. */
    readonly token: TokenConfig;
    /** Whole tokens the deployer moves into the sale account after deployment. */
    readonly supply?: bigint;
}

export interface CrowdSaleModuleResult {
    readonly sale: CrowdSaleContract;
    readonly token: Address;
}

export const CrowdSaleModule = buildModule(
    'CrowdSaleModule',
    async (context: DeployContext, params: CrowdSaleModuleParams): Promise<CrowdSaleModuleResult> => {
        const token: Address =
            params.sale.tokenAddress ?? (await TokenModule.deploy(context, params.token)).token.address;

        const sale: CrowdSaleContract = new CrowdSaleContract(
            {
                address: context.chain.createAccount(),
                owner: context.deployer,
                token,
                treasury: params.sale.treasuryAddress ?? context.deployer,
                nativePriceAsset: params.sale.defaultTokenAddress,
                startTime: params.sale.startTime,
                endTime: params.sale.endTime,
                maxPurchasePerAddress: params.sale.maxPurchaseLimit,
            },
            { chain: context.chain, oracle: context.oracle, logger: context.logger.child('CrowdSale') },
        );

        if (params.supply !== undefined && params.supply > 0n) {
            const ledger: TokenLedger = context.chain.token(token);
            const units: bigint = SafeMath.mul(params.supply, SafeMath.pow10(await ledger.decimals()));
            const funded: boolean = await ledger.transfer(context.deployer, sale.address, units);
            if (!funded) throw new ExternalCallError('transfer', 'Funding the sale account failed');
        }

        context.logger.info('Crowd sale deployed', { address: sale.address, token, treasury: sale.treasury });
        return { sale, token };
    },
);
