export { HttpProber } from './client.js';
export { ProbeConfig, DEFAULT_USER_AGENT, type ProbeConfigOptions } from './config.js';
export { classifyNetworkError } from './errors.js';
