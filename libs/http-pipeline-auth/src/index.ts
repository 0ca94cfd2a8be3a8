export * from './credentialStorage';
export * from './RefreshCoordinator';
export * from './interceptors';
export * from './factories';
