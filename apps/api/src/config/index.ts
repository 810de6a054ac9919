export { config, env, validateEnv, type EnvConfig } from './env.js';
