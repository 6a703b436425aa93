type StoredCookie = {
  name: string
  value: string
  domain: string
  hostOnly: boolean
  path: string
}

/**
 * 最小 cookie jar（会话级）
 *
 * - 功能：记录响应的 Set-Cookie，并为后续请求生成 Cookie 头
 * - 范围：仅处理 Domain/Path/Max-Age/Expires；不持久化，Secure/SameSite 忽略
 */
export class CookieJar {
  readonly #cookies = new Map<string, StoredCookie>()

  get size(): number {
    return this.#cookies.size
  }

  store(url: string, headers: Headers): void {
    const { hostname } = new URL(url)
    for (const line of headers.getSetCookie()) {
      const parsed = parseSetCookie(line, hostname.toLowerCase())
      if (!parsed) continue
      const key = `${parsed.cookie.domain};${parsed.cookie.path};${parsed.cookie.name}`
      if (parsed.expired) {
        this.#cookies.delete(key)
        continue
      }
      this.#cookies.set(key, parsed.cookie)
    }
  }

  header(url: string): string | null {
    const { hostname, pathname } = new URL(url)
    const host = hostname.toLowerCase()
    const pairs: string[] = []
    for (const c of this.#cookies.values()) {
      const domainOk = host === c.domain || (!c.hostOnly && host.endsWith(`.${c.domain}`))
      if (!domainOk || !pathMatches(pathname, c.path)) continue
      pairs.push(`${c.name}=${c.value}`)
    }
    return pairs.length > 0 ? pairs.join('; ') : null
  }

  clear(): void {
    this.#cookies.clear()
  }
}

/** 路径按段边界匹配：`/api` 匹配 `/api`、`/api/x`，不匹配 `/apiary` */
function pathMatches(pathname: string, cookiePath: string): boolean {
  if (pathname === cookiePath) return true
  if (!pathname.startsWith(cookiePath)) return false
  return cookiePath.endsWith('/') || pathname.charAt(cookiePath.length) === '/'
}

function parseSetCookie(line: string, host: string): { cookie: StoredCookie; expired: boolean } | null {
  const [pair = '', ...attrs] = line.split(';')
  const idx = pair.indexOf('=')
  if (idx <= 0) return null
  const name = pair.slice(0, idx).trim()
  const value = pair.slice(idx + 1).trim()
  if (!name) return null

  const cookie: StoredCookie = { name, value, domain: host, hostOnly: true, path: '/' }
  let expired = false
  for (const attr of attrs) {
    const eq = attr.indexOf('=')
    const k = (eq < 0 ? attr : attr.slice(0, eq)).trim().toLowerCase()
    const v = eq < 0 ? '' : attr.slice(eq + 1).trim()
    if (k === 'domain' && v) {
      cookie.domain = v.replace(/^\./, '').toLowerCase()
      cookie.hostOnly = false
    } else if (k === 'path' && v.startsWith('/')) {
      cookie.path = v
    } else if (k === 'max-age') {
      const n = Number(v)
      if (Number.isFinite(n) && n <= 0) expired = true
    } else if (k === 'expires') {
      const t = Date.parse(v)
      if (Number.isFinite(t) && t <= Date.now()) expired = true
    }
  }
  return { cookie, expired }
}
