import { z } from 'zod'
import { DEFAULT_CATALOG_URL } from '../sdk/types.js'

/**
 * CLI 配置（环境变量）
 *
 * - 功能：解析并校验运行时所需配置
 * - 参数：来自 process.env（仅在 CLI 入口调用；.env 已由 dotenv 加载）
 * - 返回：强类型 config
 * - 错误：校验失败抛出异常（启动即失败）
 */
export function loadCliConfig(env: NodeJS.ProcessEnv) {
  const schema = z.object({
    ENDPOINT_CLIENT_CATALOG_URL: z.string().url().optional().default(DEFAULT_CATALOG_URL),
    // 可选：从本地文件读取 catalog（设置后不再访问 catalog URL）
    ENDPOINT_CLIENT_CATALOG_FILE: z.string().optional().default(''),
    ENDPOINT_CLIENT_USERNAME: z.string().optional().default(''),
    ENDPOINT_CLIENT_PASSWORD: z.string().optional().default(''),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional().default('info')
  })

  return schema.parse(env)
}

export type CliConfig = ReturnType<typeof loadCliConfig>
