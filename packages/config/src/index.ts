export {
  ConfigError,
  envSchema,
  loadConfig,
  parseConfig,
  resetConfigCache,
  type Config,
  type Env,
} from './env'
