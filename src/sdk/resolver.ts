import { MissingParameterError, TooManyArgumentsError } from './errors.js'
import { UNIT_PARAM, type EndpointDescriptor, type ParamMap, type ParamValue } from './types.js'

const PLACEHOLDER = /\{([A-Za-z0-9_-]+)\}/g
/** 任意 `{…}`，用于发现无法识别的占位符 */
const ANY_BRACES = /\{[^{}]*\}/g

/**
 * 提取模板中的占位符名（按出现顺序去重）
 */
export function placeholdersOf(template: string): string[] {
  const out: string[] = []
  for (const m of template.matchAll(PLACEHOLDER)) {
    const name = m[1]
    if (name !== undefined && !out.includes(name)) out.push(name)
  }
  return out
}

/**
 * 找出模板中不符合占位符语法的 `{…}`（如 `{}`、`{member.id}`）
 */
export function unrecognizedPlaceholders(template: string): string[] {
  return [...template.matchAll(ANY_BRACES)].map((m) => m[0]).filter((p) => !/^\{[A-Za-z0-9_-]+\}$/.test(p))
}

/**
 * 拆分 `...positional, params?`：关键字参数对象只能出现在末尾
 */
export function splitArgs(args: ReadonlyArray<ParamValue | ParamMap>): { positional: ParamValue[]; params: ParamMap } {
  const positional: ParamValue[] = []
  let params: ParamMap = {}
  args.forEach((arg, i) => {
    if (typeof arg === 'object') {
      if (i !== args.length - 1) throw new TypeError('keyword parameters must be the last argument')
      params = arg
      return
    }
    positional.push(arg)
  })
  return { positional, params }
}

/**
 * 把 endpoint 模板解析为具体 URL
 *
 * - 功能：positional 按声明顺序填充（跳过已由 params 提供的参数与 `unit`）；
 *   `unit` 未提供时使用会话 unit；模板外的参数拼为 query string
 * - 参数：descriptor 目标 endpoint；positional/params 调用参数；unit 会话 unit（未登录为 null）
 * - 返回：所有占位符均已替换的 URL
 * - 错误：positional 过多抛 TooManyArgumentsError；任一必需参数缺失或模板残留 `{…}` 抛 MissingParameterError
 */
export function resolveUrl(
  descriptor: EndpointDescriptor,
  positional: readonly ParamValue[],
  params: ParamMap,
  unit?: string | null
): string {
  const inPath = placeholdersOf(descriptor.template)
  const required = [...descriptor.params]
  for (const p of inPath) if (!required.includes(p)) required.push(p)

  const values = new Map<string, string>()
  for (const [k, v] of Object.entries(params)) {
    // null/undefined 视为未提供
    if (v != null) values.set(k, String(v))
  }

  const slots = required.filter((p) => p !== UNIT_PARAM && !values.has(p))
  if (positional.length > slots.length) {
    throw new TooManyArgumentsError(descriptor.name, slots.length, positional.length)
  }
  positional.forEach((v, i) => {
    const slot = slots[i]
    if (slot !== undefined) values.set(slot, String(v))
  })

  if (required.includes(UNIT_PARAM) && !values.has(UNIT_PARAM) && unit != null) {
    values.set(UNIT_PARAM, unit)
  }

  const missing = required.filter((p) => !values.has(p))
  if (missing.length > 0) throw new MissingParameterError(descriptor.name, missing)

  const url = descriptor.template.replace(PLACEHOLDER, (whole: string, key: string) => {
    const v = values.get(key)
    return v === undefined ? whole : encodeURIComponent(v)
  })
  // 替换值已编码，残留的 `{…}` 只可能来自模板本身
  const leftover = [...url.matchAll(ANY_BRACES)].map((m) => m[0])
  if (leftover.length > 0) throw new MissingParameterError(descriptor.name, leftover)

  const query = new URLSearchParams()
  for (const [k, v] of values) {
    if (!inPath.includes(k)) query.append(k, v)
  }
  const qs = query.toString()
  if (!qs) return url
  return `${url}${url.includes('?') ? '&' : '?'}${qs}`
}
