import { EndpointClient, type EndpointClientOptions } from './client.js'
import { createLogger } from './logger.js'

/**
 * 在一次登录会话内使用客户端
 *
 * - 功能：创建客户端（提供凭据时登录）→ 执行 fn → 无论成功或抛错都登出
 * - 错误：fn 的错误在登出之后原样抛出；此时登出本身的失败只记录日志
 * - 未提供凭据时，fn 需要自行调用 client.signIn
 *
 * @example
 * const members = await withSession({ username: 'user', password: 'pass' }, async (client) => {
 *   const res = await client.get('unit-members')
 *   return res.json()
 * })
 */
export async function withSession<T>(
  opts: EndpointClientOptions,
  fn: (client: EndpointClient) => Promise<T> | T
): Promise<T> {
  const logger = opts.logger ?? createLogger()
  const client = await EndpointClient.create({ ...opts, logger })

  let result: T
  try {
    result = await fn(client)
  } catch (err) {
    await client.signOut().catch((signOutErr: unknown) => {
      logger.error('session', 'sign-out after failure also failed', {
        error: signOutErr instanceof Error ? signOutErr.message : String(signOutErr)
      })
    })
    throw err
  }

  await client.signOut()
  return result
}
