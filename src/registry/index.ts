export * from './indexed-collection';
export * from './admin-registry';
export * from './merchant-registry';
export * from './product-registry';
