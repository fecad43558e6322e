/**
 * @entry Config 配置模块
 *
 * 加载 YAML 配置、Schema 校验、环境变量覆盖
 */

export {
  loadConfig,
  getDefaultConfig,
  clearConfigCache,
  applyEnvOverrides,
  CONFIG_FILENAME,
} from './loadConfig.js'
export * from './schema.js'
