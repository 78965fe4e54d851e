/**
 * Java version information.
 */
export interface JavaVersion {
  major: number
  minor: number
  patch: number
}

/**
 * Details about a discovered JVM installation.
 */
export interface JvmDetails {
  /** Parsed semantic version */
  semver: JavaVersion
  /** Version as string (e.g., "17.0.5") */
  semverStr: string
  /** Java vendor (e.g., "Eclipse Adoptium", "Amazon") */
  vendor: string
  /** Path to the Java root directory */
  path: string
  /** Path to the Java executable */
  execPath: string
  /** Architecture: 64-bit or 32-bit */
  arch: '64-bit' | '32-bit'
}

/**
 * Provides a usable Java runtime of a given major version, downloading it if necessary.
 */
export interface JavaProvider {
  ensure(majorVersion: number, options?: { signal?: AbortSignal }): Promise<string>
}
