/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import type { HttpClient } from '../../../types/http'
import type { LoaderVersionEntry } from '../../../types/version'
import { MSMError, ErrorType, errorMessage } from '../../../types/errors'
import utils from '../../utils/utils'
import type { Logger } from '../../utils/logger'

export const FABRIC_META = 'https://meta.fabricmc.net/v2/versions'
export const FABRIC_INSTALLER = 'https://maven.fabricmc.net/net/fabricmc/fabric-installer/1.1.1/fabric-installer-1.1.1.jar'

/**
 * Fabric supports Minecraft 1.14 and later.
 */
export function isFabricCompatible(gameVersion: string) {
  return utils.isGameVersionAtLeast(gameVersion, [1, 14])
}

/**
 * Fetch every Fabric loader version (stable and unstable). Fabric loaders do not depend on the
 * Minecraft version, so `gameVersion` is `'*'`; `url` is the installer of the latest stable
 * installer release.
 */
export async function fetchFabricVersions(http: HttpClient, logger: Logger, signal?: AbortSignal): Promise<LoaderVersionEntry[]> {
  const data = await http.getJson(`${FABRIC_META}/loader`, { signal })
  if (!Array.isArray(data)) throw new MSMError(ErrorType.FETCH_ERROR, 'Invalid Fabric loader list: not an array')

  const installer = await fetchInstallerUrl(http, logger, signal)

  return data.filter(utils.isRecord).flatMap((loader) => {
    if (typeof loader.version !== 'string') return []
    return [{ kind: 'fabric' as const, version: loader.version, gameVersion: '*', stable: loader.stable === true, url: installer }]
  })
}

async function fetchInstallerUrl(http: HttpClient, logger: Logger, signal?: AbortSignal) {
  try {
    const data = await http.getJson(`${FABRIC_META}/installer`, { signal })
    const latest = (Array.isArray(data) ? data : []).filter(utils.isRecord).find((i) => i.stable === true && typeof i.url === 'string')
    if (latest && typeof latest.url === 'string') return latest.url
    logger.warn('No stable Fabric installer listed, using the default installer')
  } catch (err) {
    if (err instanceof MSMError && err.code === ErrorType.CANCELLED) throw err
    logger.warn(`Cannot fetch the Fabric installer list, using the default installer: ${errorMessage(err)}`)
  }
  return FABRIC_INSTALLER
}
