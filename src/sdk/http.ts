import { CookieJar } from './cookies.js'
import type { Logger } from './logger.js'
import type { FetchLike } from './types.js'

/**
 * 带 cookie 的 HTTP 会话
 *
 * - 功能：对注入的 fetch 做一层包装，自动带上/记录 cookie
 * - 约束：不做重试、不设超时；fetch 抛出的传输层错误原样向上抛
 */
export class HttpSession {
  readonly cookies = new CookieJar()
  readonly #fetchImpl: FetchLike
  readonly #logger: Logger

  constructor(fetchImpl: FetchLike, logger: Logger) {
    this.#fetchImpl = fetchImpl
    this.#logger = logger
  }

  get(url: string): Promise<Response> {
    return this.#send(url, { method: 'GET' })
  }

  postForm(url: string, fields: Record<string, string>): Promise<Response> {
    return this.#send(url, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams(fields).toString()
    })
  }

  async #send(url: string, init: RequestInit & { method: string }): Promise<Response> {
    const headers = new Headers(init.headers)
    const cookie = this.cookies.header(url)
    if (cookie) headers.set('cookie', cookie)

    const resp = await this.#fetchImpl(url, { ...init, headers })
    this.cookies.store(url, resp.headers)
    // 注意：不要打印 body/cookie（可能含凭据）
    this.#logger.debug('http', `${init.method} ${url} -> ${resp.status}`)
    return resp
  }
}
