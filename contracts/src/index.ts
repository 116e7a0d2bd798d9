export * from './runtime';
export * from './oracle/PriceOracleClient';
export * from './oracle/ChainlinkPriceOracle';
export * from './payment/PaymentTokenRegistry';
export * from './stages/StageLedger';
export * from './lifecycle/SaleLifecycle';
export * from './token/CappedToken';
export * from './crowdsale';
export * from './local/LocalChain';
export * from './local/MockPriceOracle';
export * from './config/env';
export * from './deploy';
