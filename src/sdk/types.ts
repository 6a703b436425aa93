export type EndpointDescriptor = {
  readonly name: string
  readonly template: string
  readonly params: readonly string[]
}

export type Catalog = ReadonlyMap<string, EndpointDescriptor>

export type ParamValue = string | number

export type ParamMap = Record<string, ParamValue | null | undefined>

/** `get(name, ...positional, params?)` 的剩余参数：末尾可选一个关键字参数对象 */
export type EndpointArgs = ParamValue[] | [...ParamValue[], ParamMap]

/** 注入的 fetch（默认全局 fetch；测试替换为替身） */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>

export const DEFAULT_CATALOG_URL = 'https://tech.lds.org/mobile/ldstools/config.json'

/** catalog 中约定的认证相关 endpoint 名 */
export const AUTH_ENDPOINT = 'auth-url'
export const SIGNOUT_ENDPOINT = 'signout-url'
export const UNIT_ENDPOINT = 'current-user-unit'

export const UNIT_PARAM = 'unit'
