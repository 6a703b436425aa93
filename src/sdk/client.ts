import { Authenticator } from './auth.js'
import { loadCatalog } from './catalog.js'
import { UnknownEndpointError } from './errors.js'
import { HttpSession } from './http.js'
import { createLogger, type Logger } from './logger.js'
import { resolveUrl, splitArgs } from './resolver.js'
import {
  DEFAULT_CATALOG_URL,
  type Catalog,
  type EndpointArgs,
  type EndpointDescriptor,
  type FetchLike
} from './types.js'

export type EndpointClientOptions = {
  username?: string
  password?: string
  /** 默认 DEFAULT_CATALOG_URL */
  catalogUrl?: string
  /** 预先加载好的 catalog（提供时不再拉取） */
  catalog?: Catalog
  fetchImpl?: FetchLike
  logger?: Logger
}

/**
 * endpoint catalog 客户端
 *
 * 每个实例持有一份 catalog 与一个会话。catalog 只在创建时拉取一次，
 * 长生命周期实例可能读到过期 catalog。
 *
 * @example
 * const client = await EndpointClient.create({ username: 'user', password: 'pass' })
 * const res = await client.get('photo-url', 'individual', { member: 42 })
 */
export class EndpointClient {
  readonly #catalog: Catalog
  readonly #http: HttpSession
  readonly #auth: Authenticator
  readonly #logger: Logger

  constructor(deps: { catalog: Catalog; fetchImpl?: FetchLike; logger?: Logger }) {
    this.#catalog = deps.catalog
    this.#logger = deps.logger ?? createLogger()
    this.#http = new HttpSession(deps.fetchImpl ?? fetch, this.#logger)
    this.#auth = new Authenticator({ http: this.#http, catalog: this.#catalog, logger: this.#logger })
  }

  /**
   * 创建客户端：拉取 catalog，提供用户名与口令时立即登录
   */
  static async create(opts: EndpointClientOptions = {}): Promise<EndpointClient> {
    const fetchImpl = opts.fetchImpl ?? fetch
    const logger = opts.logger ?? createLogger()
    const catalog = opts.catalog ?? (await loadCatalog(fetchImpl, opts.catalogUrl ?? DEFAULT_CATALOG_URL, logger))

    const client = new EndpointClient({ catalog, fetchImpl, logger })
    if (opts.username && opts.password) {
      await client.signIn(opts.username, opts.password)
    }
    return client
  }

  get signedIn(): boolean {
    return this.#auth.signedIn
  }

  get unit(): string | null {
    return this.#auth.unit
  }

  /** 全部 endpoint（按 name 排序） */
  endpoints(): EndpointDescriptor[] {
    return [...this.#catalog.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  endpoint(name: string): EndpointDescriptor {
    const desc = this.#catalog.get(name)
    if (!desc) throw new UnknownEndpointError(name)
    return desc
  }

  signIn(username: string, password: string): Promise<void> {
    return this.#auth.signIn(username, password)
  }

  signOut(): Promise<void> {
    return this.#auth.signOut()
  }

  /**
   * 解析 endpoint 为具体 URL（不发请求）
   *
   * @param name endpoint 名
   * @param args 位置参数，末尾可附一个关键字参数对象
   */
  resolve(name: string, ...args: EndpointArgs): string {
    const { positional, params } = splitArgs(args)
    return resolveUrl(this.endpoint(name), positional, params, this.#auth.unit)
  }

  /**
   * GET 某个 endpoint，原样返回 Response（不校验响应结构）
   *
   * - 错误：UnknownEndpointError / MissingParameterError / TooManyArgumentsError；传输层错误原样抛出
   */
  async get(name: string, ...args: EndpointArgs): Promise<Response> {
    const { positional, params } = splitArgs(args)
    const url = resolveUrl(this.endpoint(name), positional, params, this.#auth.unit)
    this.#logger.debug('client', `GET ${name}`)
    return this.#http.get(url)
  }
}
