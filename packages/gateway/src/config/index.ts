export { loadGatewayConfig, normalizeEndpoint, type GatewayConfig, type Environment } from './config.js';
