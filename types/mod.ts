/**
 * A mod jar in the `mods` folder of a server.
 */
export interface ModInfo {
  /** File name without `.jar` or `.jar.disabled`. Used to enable and disable the mod. */
  id: string
  /** Current file name. */
  file: string
  /** `false` when the file ends with `.jar.disabled`. */
  enabled: boolean
  /** Display name, the file name when the jar has no metadata. */
  name: string
  /** Mod version, `null` if unknown. */
  version: string | null
  /** Loader the metadata was written for. */
  loader: 'fabric' | 'forge' | 'unknown'
  /** Mod ID declared in the metadata. */
  modId: string | null
  /** Minecraft version (or range) the mod depends on. */
  gameVersion: string | null
  authors: string[]
  description: string
  /** Size in bytes. */
  size: number
}

export type ModListFormat = 'text' | 'json'
