export {
  EnvSchema,
  DEFAULT_ONS_WEIGHTS_URL,
  parseEnv,
  createConfig,
  type Env,
  type AppConfig,
  type PrimaryIndexConfig,
} from './env.js';
