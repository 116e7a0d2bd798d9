export * from './CrowdSaleContract';
