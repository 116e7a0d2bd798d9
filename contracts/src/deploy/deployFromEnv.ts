// Environment-driven deployment onto a local chain.
// Reads TOKEN_ADDRESS, DEFAULT_TOKEN_ADDRESS, START_TIME, END_TIME and the rest
// of the sale settings, then runs CrowdSaleModule (and TokenModule when no
// token address is set). Run directly: `npm run deploy:local`.

import type { Address } from 'viem';

import { loadConfig, parseConfig, type AppConfig } from '../config/env';
import { LocalChain } from '../local/LocalChain';
import { MockPriceOracle } from '../local/MockPriceOracle';
import type { PriceOracle } from '../oracle/PriceOracleClient';
import { describeRevert } from '../runtime/Revert';
import { createLogger, type Logger } from '../runtime/logger';
import { CrowdSaleModule, type CrowdSaleModuleResult } from './CrowdSaleModule';
import type { DeployContext } from './DeployModule';

export interface DeployFromEnvOptions {
    /** Variables to parse instead of loading `.env` into process.env. */
    readonly env?: NodeJS.ProcessEnv;
    readonly envPath?: string;
    readonly chain?: LocalChain;
    readonly oracle?: PriceOracle;
    /** Log sink; stderr by default. */
    readonly write?: (line: string) => void;
}

export interface EnvDeployment extends CrowdSaleModuleResult {
    readonly config: AppConfig;
    readonly chain: LocalChain;
    readonly deployer: Address;
}

export async function deployFromEnv(options: DeployFromEnvOptions = {}): Promise<EnvDeployment> {
    const config: AppConfig = options.env ? parseConfig(options.env) : loadConfig(options.envPath);
    const logger: Logger = createLogger('Deploy', {
        level: config.logLevel,
        json: config.logJson,
        write: options.write,
    });

    const chain: LocalChain = options.chain ?? new LocalChain();
    const deployer: Address = chain.createAccount();
    const context: DeployContext = {
        chain,
        deployer,
        oracle: options.oracle ?? new MockPriceOracle(() => chain.now()),
        logger,
    };

    const result: CrowdSaleModuleResult = await CrowdSaleModule.deploy(context, {
        sale: config.sale,
        token: config.token,
    });

    logger.info('Deployment complete', {
        deployer,
        sale: result.sale.address,
        token: result.token,
        startTime: config.sale.startTime,
        endTime: config.sale.endTime,
    });
    return { ...result, config, chain, deployer };
}

if (require.main === module) {
    deployFromEnv().catch((error: unknown) => {
        createLogger('Deploy').error('Deployment failed', { error: describeRevert(error) });
        process.exitCode = 1;
    });
}
