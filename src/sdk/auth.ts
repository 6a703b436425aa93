import { z } from 'zod'
import { AuthenticationError } from './errors.js'
import type { HttpSession } from './http.js'
import type { Logger } from './logger.js'
import { resolveUrl } from './resolver.js'
import { AUTH_ENDPOINT, SIGNOUT_ENDPOINT, UNIT_ENDPOINT, type Catalog } from './types.js'

const unitResponseSchema = z.object({
  message: z.union([z.string().min(1), z.number()])
})

/**
 * 登录态管理
 *
 * - 功能：登录（表单 POST）、读取当前用户 unit、登出
 * - 状态：signedIn/unit + HttpSession 中的 cookie；登出后全部清空
 */
export class Authenticator {
  readonly #http: HttpSession
  readonly #catalog: Catalog
  readonly #logger: Logger
  #signedIn = false
  #unit: string | null = null

  constructor(deps: { http: HttpSession; catalog: Catalog; logger: Logger }) {
    this.#http = deps.http
    this.#catalog = deps.catalog
    this.#logger = deps.logger
  }

  get signedIn(): boolean {
    return this.#signedIn
  }

  get unit(): string | null {
    return this.#unit
  }

  /**
   * 登录
   *
   * - 判定：非 2xx 或响应缺少 etag 头均视为登录失败（服务端对错误口令同样返回 200）
   * - 副作用：记录 cookie 与 unit；unit 查询失败会先尽力远端登出，再回滚登录态
   * - 错误：AuthenticationError；fetch 的传输层错误原样抛出
   */
  async signIn(username: string, password: string): Promise<void> {
    const auth = this.#catalog.get(AUTH_ENDPOINT)
    if (!auth) throw new AuthenticationError(`catalog has no ${AUTH_ENDPOINT} endpoint`)

    const resp = await this.#http.postForm(resolveUrl(auth, [], {}), { username, password })
    if (!resp.ok) {
      this.#invalidate()
      throw new AuthenticationError(`HTTP ${resp.status}`, { status: resp.status })
    }
    if (!resp.headers.has('etag')) {
      this.#invalidate()
      throw new AuthenticationError('invalid credentials', { status: resp.status })
    }

    this.#signedIn = true
    try {
      this.#unit = await this.#fetchUnit()
    } catch (e) {
      await this.#remoteSignOut().catch((signOutErr: unknown) => {
        this.#logger.warn('auth', 'sign-out after failed unit lookup also failed', {
          error: signOutErr instanceof Error ? signOutErr.message : String(signOutErr)
        })
      })
      this.#invalidate()
      throw e
    }
    this.#logger.info('auth', 'signed in', { unit: this.#unit })
  }

  /**
   * 登出（幂等）
   *
   * - 未登录时直接返回
   * - 远端登出失败时本地会话仍会失效，错误继续向上抛
   */
  async signOut(): Promise<void> {
    if (!this.#signedIn) return

    try {
      await this.#remoteSignOut()
    } finally {
      this.#invalidate()
      this.#logger.info('auth', 'signed out')
    }
  }

  async #remoteSignOut(): Promise<void> {
    const signout = this.#catalog.get(SIGNOUT_ENDPOINT)
    if (!signout) return
    const resp = await this.#http.get(resolveUrl(signout, [], {}, this.#unit))
    if (!resp.ok) this.#logger.warn('auth', `sign-out returned HTTP ${resp.status}`)
  }

  async #fetchUnit(): Promise<string | null> {
    const desc = this.#catalog.get(UNIT_ENDPOINT)
    if (!desc) {
      this.#logger.warn('auth', `catalog has no ${UNIT_ENDPOINT} endpoint; unit will not be auto-filled`)
      return null
    }

    const resp = await this.#http.get(resolveUrl(desc, [], {}))
    if (!resp.ok) {
      throw new AuthenticationError(`unit lookup HTTP ${resp.status}`, { status: resp.status })
    }

    let body: unknown
    try {
      body = await resp.json()
    } catch (e) {
      throw new AuthenticationError('unit lookup returned invalid json', { cause: e })
    }
    const parsed = unitResponseSchema.safeParse(body)
    if (!parsed.success) {
      throw new AuthenticationError('unit lookup returned unexpected shape', { cause: parsed.error })
    }
    return String(parsed.data.message)
  }

  #invalidate() {
    this.#signedIn = false
    this.#unit = null
    this.#http.cookies.clear()
  }
}
