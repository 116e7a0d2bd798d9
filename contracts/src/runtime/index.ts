export * from './Revert';
export * from './SafeMath';
export * from './NetEvent';
export * from './Chain';
export * from './address';
export * from './ReentrancyGuard';
export * from './logger';
