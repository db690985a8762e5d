export * from './identity-token';
export * from './order-settlement';
