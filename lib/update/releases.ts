/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import type { Checksum, ChecksumAlgorithm, Release, ReleaseFile } from '../../types/update'
import { MSMError, ErrorType } from '../../types/errors'
import utils from '../utils/utils'

/**
 * Validate the release feed. Accepts the GitHub releases API shape (`tag_name`,
 * `browser_download_url`) and the short shape (`tagName`, `url`).
 */
function parseReleases(data: unknown): Release[] {
  if (!Array.isArray(data)) throw new MSMError(ErrorType.FETCH_ERROR, 'Invalid release feed: not an array')

  return data.filter(utils.isRecord).flatMap((rel) => {
    const tag = typeof rel.tag_name === 'string' ? rel.tag_name : typeof rel.tagName === 'string' ? rel.tagName : null
    if (!tag) return []
    const assets: ReleaseFile[] = (Array.isArray(rel.assets) ? rel.assets : []).filter(utils.isRecord).flatMap((a) => {
      const url = typeof a.browser_download_url === 'string' ? a.browser_download_url : typeof a.url === 'string' ? a.url : null
      if (typeof a.name !== 'string' || !url) return []
      return [{ name: a.name, browser_download_url: url, size: typeof a.size === 'number' ? a.size : undefined }]
    })
    return [
      {
        tag_name: tag,
        name: typeof rel.name === 'string' ? rel.name : null,
        draft: rel.draft === true,
        prerelease: rel.prerelease === true,
        body: typeof rel.body === 'string' ? rel.body : null,
        html_url: typeof rel.html_url === 'string' ? rel.html_url : undefined,
        assets
      }
    ]
  })
}

/**
 * The first release of the feed that is not a draft (nor a pre-release, unless `includePrerelease`).
 */
function latestRelease(releases: Release[], includePrerelease: boolean = false): Release | null {
  return releases.find((rel) => !rel.draft && (includePrerelease || !rel.prerelease)) ?? null
}

/**
 * The installer (`.exe`) of a release. Names containing `setup` or `installer` are preferred.
 */
function chooseInstallerAsset(release: Release): ReleaseFile | null {
  const exe = release.assets.filter((a) => a.name.toLowerCase().endsWith('.exe') && a.browser_download_url)
  return exe.find((a) => /setup|installer/.test(a.name.toLowerCase())) ?? exe[0] ?? null
}

/**
 * The portable archive (`*portable*.zip`) of a release.
 */
function choosePortableAsset(release: Release): ReleaseFile | null {
  return release.assets.find((a) => /portable.*\.zip$/.test(a.name.toLowerCase()) && a.browser_download_url) ?? null
}

const HEX = /^[0-9a-fA-F]+$/
const LENGTHS: Record<number, ChecksumAlgorithm> = { 64: 'sha256', 128: 'sha512' }

function hexToken(token: string): Checksum | null {
  const clean = token.replace(/^[`*|(\[]+|[`*|)\],.:;]+$/g, '').replace(/^sha(256|512):/i, '')
  const algorithm = LENGTHS[clean.length]
  if (!algorithm || !HEX.test(clean)) return null
  return { algorithm, digest: clean.toLowerCase() }
}

/**
 * Whether a line names the file `name` as a whole word (`app.zip` is not named by `app.zip.sig`).
 */
function namesAsset(line: string, name: string) {
  return line
    .toLowerCase()
    .split(/[\s`*|()[\],;:]+/)
    .some((token) => token.replace(/\.+$/, '').split(/[\\/]/).pop() === name)
}

/**
 * Find the checksum of an asset in a text (release notes, `SHA256SUMS` file...): a line that names
 * the asset and contains a SHA-256 (64 hex) or SHA-512 (128 hex) digest.
 * @param requireName [Optional: default is `true`] If `false`, a line with a digest and no file
 * name is accepted too (sidecar files such as `<asset>.sha256`).
 */
function parseChecksumText(text: string, assetName: string, requireName: boolean = true): Checksum | null {
  const name = assetName.split(/[\\/]/).pop()?.toLowerCase() ?? ''
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim()
    if (!line) continue
    const tokens = line.split(/\s+/)
    const named = namesAsset(line, name)
    if (!named && (requireName || tokens.length > 2)) continue
    for (const token of tokens) {
      const checksum = hexToken(token)
      if (checksum) return checksum
    }
  }
  return null
}

/**
 * Assets of a release that may publish the checksum of `assetName`, most specific first.
 */
function checksumAssets(release: Release, assetName: string): { file: ReleaseFile; sidecar: boolean }[] {
  const lower = assetName.toLowerCase()
  const sidecars = release.assets.filter((a) => [`${lower}.sha256`, `${lower}.sha512`].includes(a.name.toLowerCase()))
  const lists = release.assets.filter((a) => /^(sha256sums|sha512sums|checksums)(\.txt)?$/.test(a.name.toLowerCase()))
  return [...sidecars.map((file) => ({ file, sidecar: true })), ...lists.map((file) => ({ file, sidecar: false }))]
}

/**
 * Version of a tag, without the `v` prefix.
 */
function tagVersion(tag: string) {
  return tag.trim().replace(/^[vV]/, '')
}

export default { parseReleases, latestRelease, chooseInstallerAsset, choosePortableAsset, parseChecksumText, checksumAssets, tagVersion }
