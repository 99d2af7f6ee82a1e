export { SwiftClient } from './client.js';
export { createClient, createClientFromEnv, type ClientDependencies } from './factory.js';
