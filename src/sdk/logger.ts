export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export type Logger = {
  debug: (tag: string, msg: string, meta?: unknown) => void
  info: (tag: string, msg: string, meta?: unknown) => void
  warn: (tag: string, msg: string, meta?: unknown) => void
  error: (tag: string, msg: string, meta?: unknown) => void
}

const order: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 }

/**
 * 创建分级日志器（console）
 *
 * - 功能：按 level 过滤，输出 `[ts] [LEVEL] [tag] msg`（meta 以 JSON 追加）
 * - 参数：level 最低输出级别；write 输出函数（默认 console.log，测试可替换）；now 时钟
 * - 注意：调用方不要传入 password/cookie
 */
export function createLogger(opts?: {
  level?: LogLevel
  write?: (line: string) => void
  now?: () => Date
}): Logger {
  const threshold = order[opts?.level ?? 'warn']
  const write = opts?.write ?? ((line: string) => console.log(line))
  const now = opts?.now ?? (() => new Date())

  const emit = (level: Exclude<LogLevel, 'silent'>, tag: string, msg: string, meta?: unknown) => {
    if (order[level] < threshold) return
    const line = `[${now().toISOString()}] [${level.toUpperCase()}] [${tag}] ${msg}`
    write(meta === undefined ? line : `${line} ${JSON.stringify(meta)}`)
  }

  return {
    debug: (tag, msg, meta) => emit('debug', tag, msg, meta),
    info: (tag, msg, meta) => emit('info', tag, msg, meta),
    warn: (tag, msg, meta) => emit('warn', tag, msg, meta),
    error: (tag, msg, meta) => emit('error', tag, msg, meta)
  }
}
