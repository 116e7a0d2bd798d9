export * from './DeployModule';
export * from './TokenModule';
export * from './CrowdSaleModule';
export * from './deployFromEnv';
