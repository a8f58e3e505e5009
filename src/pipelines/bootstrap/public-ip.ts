import {isIP} from 'node:net'
import {dirname} from 'node:path'
import {mkdir, writeFile} from 'node:fs/promises'
import type {BootstrapConfig, Step} from '../../core/index.js'
import {HttpError, InvalidPublicIpError, NetworkError} from '../../errors.js'
import type {BootstrapRun, PublicIpResolver} from './types.js'

export const fetchPublicIp: PublicIpResolver = async (url, timeoutMs) => {
  let response: Response
  try {
    response = await fetch(url, {
      headers: {accept: 'text/plain'},
      signal: AbortSignal.timeout(timeoutMs)
    })
  } catch (error) {
    throw new NetworkError('REQUEST_FAILED', `GET ${url} failed`, {cause: error})
  }

  if (!response.ok) {
    throw new HttpError(url, response.status)
  }

  return response.text()
}

/**
 * Trims the echo service's answer and checks it is an IPv4 or IPv6 address.
 * @throws InvalidPublicIpError for anything else (HTML pages, empty bodies)
 */
export function parsePublicIp(raw: string): string {
  const value = raw.trim()
  if (isIP(value) === 0) {
    throw new InvalidPublicIpError(value)
  }

  return value
}

/** Records the public IP as a single line, replacing the previous record. */
export function publicIpStep(
  settings: BootstrapConfig['publicIp'],
  resolvePublicIp: PublicIpResolver = fetchPublicIp
): Step<BootstrapRun> {
  return {
    id: 'public-ip',
    name: 'Save public IP',
    async action(ctx) {
      const ip = parsePublicIp(await resolvePublicIp(settings.url, settings.timeoutMs))
      await mkdir(dirname(settings.file), {recursive: true})
      await writeFile(settings.file, `${ip}\n`, 'utf8')
      ctx.run.publicIp = ip
      ctx.log(`Public IP saved to ${settings.file}: ${ip}`)
    }
  }
}
