export * from './types';
export * from './errors';
export * from './requestDescriptor';
export * from './classifier';
export * from './retry';
export * from './interceptors';
export * from './decoders';
export * from './configuration';
export { ConsoleLogger, noopLogger, errorMessage } from './logger';
export { RequestBuilder } from './RequestBuilder';
export { NetworkClient, type NetworkClientOptions } from './NetworkClient';
export { createNetworkClient, createMobileNetworkClient } from './factories';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
export { toTransportError, failureKindForCode } from './transport/transportErrors';
