/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import type { HttpClient } from '../../../types/http'
import type { LoaderVersionEntry } from '../../../types/version'
import utils from '../../utils/utils'

export const FORGE_MAVEN = 'https://maven.minecraftforge.net/net/minecraftforge/forge'

const UNSTABLE = ['pre', 'beta', 'alpha', 'snapshot', 'rc']

export function forgeInstallerUrl(gameVersion: string, forgeVersion: string) {
  const full = `${gameVersion}-${forgeVersion}`
  return `${FORGE_MAVEN}/${full}/forge-${full}-installer.jar`
}

/**
 * Parse the Forge `maven-metadata.xml`. Versions look like `1.20.1-47.2.0`; the ones containing
 * pre/beta/alpha/snapshot/rc are pre-releases.
 * @returns The versions grouped by Minecraft version (newest first), newest Forge version first.
 */
export function parseForgeMetadata(xml: string): LoaderVersionEntry[] {
  const entries: LoaderVersionEntry[] = []
  for (const match of xml.matchAll(/<version>\s*([^<\s]+)\s*<\/version>/g)) {
    const full = match[1]
    const dash = full.indexOf('-')
    if (dash <= 0 || dash === full.length - 1) continue

    const gameVersion = full.slice(0, dash)
    const version = full.slice(dash + 1)
    const lower = full.toLowerCase()
    entries.push({
      kind: 'forge',
      version,
      gameVersion,
      stable: !UNSTABLE.some((keyword) => lower.includes(keyword)),
      url: `${FORGE_MAVEN}/${full}/forge-${full}-installer.jar`
    })
  }

  return entries.sort((a, b) => utils.compareVersions(b.gameVersion, a.gameVersion) || utils.compareVersions(b.version, a.version))
}

export async function fetchForgeVersions(http: HttpClient, signal?: AbortSignal): Promise<LoaderVersionEntry[]> {
  const xml = await http.getText(`${FORGE_MAVEN}/maven-metadata.xml`, { signal })
  return parseForgeMetadata(xml)
}
