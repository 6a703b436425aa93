import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { CatalogFetchError } from './errors.js'
import type { Logger } from './logger.js'
import { placeholdersOf, unrecognizedPlaceholders } from './resolver.js'
import type { Catalog, EndpointDescriptor, FetchLike } from './types.js'

const zDescriptorRaw = z
  .object({
    template: z.string().min(1),
    params: z.array(z.string().min(1)).optional()
  })
  .passthrough()

const zNamedDescriptorRaw = zDescriptorRaw.extend({ name: z.string().min(1) })

const zCatalogDoc = z.union([z.array(z.unknown()), z.record(z.unknown())])

/** 旧式 catalog 中的位置占位符 */
const LEGACY_MARKERS = ['%@', '%d', '%.0f'] as const

/**
 * 规范化旧式 URL（`%@` 等位置占位符）为 `{name}` 模板
 *
 * - unit 位置：`unit/%@`、`unitNumber=%@`、`unit-*` 且以 `/%@` 结尾
 * - member 位置：`membership-record/%@`、`photo/url/%@`
 * - 其余占位符依次命名为 `arg0`、`arg1`…
 */
export function normalizeLegacyUrl(name: string, url: string): string {
  let out = url

  if (out.includes('unit/%@')) {
    out = out.replaceAll('unit/%@', 'unit/{unit}')
  } else if (out.includes('unitNumber=%@')) {
    out = out.replaceAll('=%@', '={unit}')
  } else if (name.startsWith('unit-') && out.endsWith('/%@')) {
    out = `${out.slice(0, -2)}{unit}`
  }

  if (out.includes('membership-record/%@')) {
    out = out.replaceAll('%@', '{member}')
  } else if (out.includes('photo/url/%@')) {
    out = out.replaceAll('url/%@', 'url/{member}')
  }

  for (const marker of LEGACY_MARKERS) out = out.replaceAll(marker, '{}')

  let n = 0
  return out.replace(/\{\}/g, () => `{arg${n++}}`)
}

/** 模板含无法识别的 `{…}` 时返回 null（该条目被跳过） */
function makeDescriptor(name: string, template: string, declared?: readonly string[]): EndpointDescriptor | null {
  if (unrecognizedPlaceholders(template).length > 0) return null
  const params: string[] = []
  for (const p of [...(declared ?? []), ...placeholdersOf(template)]) {
    if (!params.includes(p)) params.push(p)
  }
  return Object.freeze({ name, template, params: Object.freeze(params) })
}

/**
 * 解析 catalog 文档
 *
 * - 功能：支持三种形态：name → {template, params}；[{name, template, params}]；name → 旧式 URL 字符串
 * - 参数：raw 已 JSON.parse 的文档
 * - 返回：name → EndpointDescriptor
 * - 错误：顶层结构不合法/没有任何 endpoint 抛 CatalogFetchError；单个条目不合法（含无法识别的 `{…}`）则跳过
 */
export function parseCatalog(raw: unknown): Catalog {
  const parsed = zCatalogDoc.safeParse(raw)
  if (!parsed.success) {
    throw new CatalogFetchError('invalid top-level structure', { cause: parsed.error })
  }

  const map = new Map<string, EndpointDescriptor>()
  const doc = parsed.data

  if (Array.isArray(doc)) {
    for (const item of doc) {
      const ep = zNamedDescriptorRaw.safeParse(item)
      if (!ep.success) continue
      const desc = makeDescriptor(ep.data.name, ep.data.template, ep.data.params)
      if (desc) map.set(desc.name, desc)
    }
  } else {
    for (const [name, value] of Object.entries(doc)) {
      if (typeof value === 'string') {
        // 旧式 config 中混有版本号等非 URL 配置项
        if (!value.startsWith('http')) continue
        const legacy = makeDescriptor(name, normalizeLegacyUrl(name, value))
        if (legacy) map.set(name, legacy)
        continue
      }
      const ep = zDescriptorRaw.safeParse(value)
      if (!ep.success) continue
      const desc = makeDescriptor(name, ep.data.template, ep.data.params)
      if (desc) map.set(name, desc)
    }
  }

  if (map.size === 0) {
    throw new CatalogFetchError('no endpoints found')
  }
  return map
}

/**
 * 拉取远端 catalog（JSON）
 *
 * - 功能：GET catalog URL 并解析；每个 client 构造时调用一次
 * - 错误：网络失败/非 2xx/JSON 不合法/结构不合法统一抛 CatalogFetchError（cause 保留原始错误）
 */
export async function loadCatalog(fetchImpl: FetchLike, url: string, logger?: Logger): Promise<Catalog> {
  let resp: Response
  try {
    resp = await fetchImpl(url, { method: 'GET', headers: { accept: 'application/json' } })
  } catch (e) {
    throw new CatalogFetchError(`network error fetching ${url}`, { cause: e })
  }
  if (!resp.ok) {
    throw new CatalogFetchError(`HTTP ${resp.status}`, { status: resp.status })
  }

  let raw: unknown
  try {
    raw = await resp.json()
  } catch (e) {
    throw new CatalogFetchError('invalid json', { status: resp.status, cause: e })
  }

  const catalog = parseCatalog(raw)
  logger?.debug('catalog', `loaded ${catalog.size} endpoints`, { url })
  return catalog
}

/**
 * 从文件读取 catalog（离线使用）
 *
 * @param filePath catalog 文件路径
 */
export async function readCatalogFile(filePath: string): Promise<Catalog> {
  let raw: unknown
  try {
    raw = JSON.parse(await readFile(filePath, 'utf-8'))
  } catch (e) {
    throw new CatalogFetchError(`cannot read ${filePath}`, { cause: e })
  }
  return parseCatalog(raw)
}
