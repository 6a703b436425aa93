#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv'
import { loadCliConfig } from './config.js'
import { defaultIO } from './io.js'
import { runCli } from './run.js'

/**
 * CLI 入口
 *
 * - 功能：加载 .env 与配置后执行命令
 * - 约束：配置不合法直接退出
 */
async function main() {
  loadDotenv()
  const config = loadCliConfig(process.env)
  process.exitCode = await runCli({ argv: process.argv.slice(2), config, io: defaultIO() })
}

main().catch((e) => {
  console.error('[cli] failed to start:', e)
  process.exitCode = 1
})
