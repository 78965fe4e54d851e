export type DeploymentMode = 'installed' | 'portable'

export type ChecksumAlgorithm = 'sha256' | 'sha512'

export interface Checksum {
  algorithm: ChecksumAlgorithm
  digest: string
}

/**
 * A release of the release feed (GitHub releases API shape).
 */
export interface Release {
  tag_name: string
  name?: string | null
  draft?: boolean
  prerelease?: boolean
  body?: string | null
  html_url?: string
  assets: ReleaseFile[]
}

export interface ReleaseFile {
  name: string
  browser_download_url: string
  size?: number
}

/**
 * How the asset was selected.
 * - `portable`: portable mode, portable archive found;
 * - `installer`: installed mode, installer found;
 * - `installer_fallback`: portable mode, no portable archive, installer used instead.
 */
export type AssetMode = 'portable' | 'installer' | 'installer_fallback'

export interface ReleaseAsset {
  tag: string
  version: string
  name: string
  url: string
  mode: AssetMode
  checksum: Checksum | null
}

export type UpdateCheck =
  | { status: 'up_to_date'; currentVersion: string; latestVersion: string | null }
  | { status: 'available'; currentVersion: string; latestVersion: string; asset: ReleaseAsset; notes: string | null }
  | { status: 'unverifiable'; currentVersion: string; latestVersion: string; asset: ReleaseAsset; notes: string | null }
  | { status: 'no_asset'; currentVersion: string; latestVersion: string }

export interface UpdateTransaction {
  stagingDir: string
  /** Backup of the installation, `null` in installed mode (the installer handles it). */
  backupDir: string | null
  /** Downloaded and verified asset. */
  assetPath: string
  verified: boolean
  mode: DeploymentMode
}

/**
 * Closes the application and swaps the staged tree into place (portable mode).
 */
export interface UpdateSwapper {
  handOff(transaction: UpdateTransaction): Promise<void>
}

/**
 * Launches the platform installer and exits the application (installed mode).
 */
export interface InstallerLauncher {
  launch(installerPath: string): Promise<void>
}
