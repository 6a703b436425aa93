import yargs from 'yargs'
import { readCatalogFile } from '../sdk/catalog.js'
import { EndpointClient, type EndpointClientOptions } from '../sdk/client.js'
import { createLogger } from '../sdk/logger.js'
import { withSession } from '../sdk/scoped.js'
import type { FetchLike, ParamMap, ParamValue } from '../sdk/types.js'
import type { CliConfig } from './config.js'
import type { IO } from './io.js'

/**
 * CLI adapter：解析参数 → 调用 SDK → 打印结果
 *
 * 用法：
 * - endpoint-client                                 列出全部 endpoint
 * - endpoint-client -e unit-members                 打印某个 endpoint 的响应
 * - endpoint-client -e members-moved-in 2           附带位置参数
 * - endpoint-client -e photo-url -m 123 individual  指定 member
 *
 * @returns 进程退出码
 */
export async function runCli(opts: {
  argv: string[]
  config: CliConfig
  io: IO
  fetchImpl?: FetchLike
}): Promise<number> {
  const { argv, config, io } = opts

  const parser = yargs(argv)
    .scriptName('endpoint-client')
    .usage('$0 [-e <endpoint>] [args..]')
    .option('endpoint', { alias: 'e', type: 'string', describe: 'Endpoint to print' })
    .option('member', { alias: 'm', type: 'string', describe: 'Member number' })
    .option('unit', { alias: 'u', type: 'string', describe: 'Unit number other than the signed-in user' })
    .option('json', { alias: 'j', type: 'boolean', default: false, describe: 'Output compact JSON' })
    .option('username', { type: 'string' })
    .option('password', { type: 'string' })
    .version(false)
    .help()
    .strict()
    .exitProcess(false)
    .fail(false)

  try {
    const args = await parser.parseAsync()
    if (argv.includes('--help') || argv.includes('-h')) return 0

    const logger = createLogger({ level: config.LOG_LEVEL, write: (line) => io.stderr(`${line}\n`) })
    const clientOpts: EndpointClientOptions = {
      catalogUrl: config.ENDPOINT_CLIENT_CATALOG_URL,
      catalog: config.ENDPOINT_CLIENT_CATALOG_FILE ? await readCatalogFile(config.ENDPOINT_CLIENT_CATALOG_FILE) : undefined,
      fetchImpl: opts.fetchImpl,
      logger
    }

    const endpoint = args.endpoint
    if (!endpoint) {
      const client = await EndpointClient.create(clientOpts)
      for (const d of client.endpoints()) {
        io.stdout(`[${d.name.padEnd(25)}] ${d.template}\n`)
      }
      return 0
    }

    const username = args.username ?? config.ENDPOINT_CLIENT_USERNAME
    const password = args.password ?? config.ENDPOINT_CLIENT_PASSWORD
    if (!username || !password) {
      throw new Error(
        'Give --username and --password or set ENDPOINT_CLIENT_USERNAME and ENDPOINT_CLIENT_PASSWORD'
      )
    }

    const positional: ParamValue[] = args._.map((v) => (typeof v === 'number' ? v : String(v)))
    const params: ParamMap = {}
    if (args.member) params.member = args.member
    if (args.unit) params.unit = args.unit

    await withSession({ ...clientOpts, username, password }, async (client) => {
      const resp = await client.get(endpoint, ...positional, params)
      await printResponse(io, resp, args.json)
    })
    return 0
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }
}

async function printResponse(io: IO, resp: Response, compact: boolean): Promise<void> {
  if (resp.status !== 200) {
    io.stderr(`Error: ${resp.status} ${resp.statusText}\n`)
  }

  const contentType = resp.headers.get('content-type') ?? ''
  if (contentType.includes('html')) {
    io.stdout(`<!-- ${resp.status} ${resp.statusText} -->\n`)
    io.stdout(`<!-- ${resp.url} -->\n`)
    io.stdout(`${await resp.text()}\n`)
    return
  }
  if (contentType.includes('json')) {
    const body: unknown = await resp.json()
    io.stdout(`${compact ? JSON.stringify(body) : JSON.stringify(body, null, 2)}\n`)
    return
  }
  io.stdout(`${await resp.text()}\n`)
}
