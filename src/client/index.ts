export * from './adapters';
export { config, loadClientConfig, type ClientConfig } from './config';
