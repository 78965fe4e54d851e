import type { ErrorCode } from './errors'
import type { LoaderKind, ServerRecord } from './server'

export type InstallStage = 'PENDING' | 'RESOLVING_JAVA' | 'DOWNLOADING' | 'INSTALLING' | 'VERIFYING' | 'COMPLETE' | 'FAILED'

export interface InstallPlan {
  record: ServerRecord
  kind: LoaderKind
  gameVersion: string
  loaderVersion: string | null
  /** Required Java major version. */
  javaMajor: number
  /** Java executable, `null` until the Java stage resolved it. */
  javaPath: string | null
  /** Installer URL (Fabric, Forge), `null` for vanilla. */
  installerUrl: string | null
  /** Server jar URL (vanilla), `null` for loaders. */
  serverJarUrl: string | null
  /** SHA1 of the server jar, when published. */
  serverJarSha1: string | null
  targetDir: string
  /** At least one of these files must exist after installation. */
  expectedArtifacts: string[]
  /** Launch scripts the installer may produce. */
  expectedLaunchScripts: string[]
}

export type InstallResult =
  | { status: 'COMPLETE'; plan: InstallPlan; javaPath: string; artifact: string; launchScript: string | null }
  | { status: 'FAILED'; plan: InstallPlan; stage: InstallStage; code: ErrorCode; message: string; exitCode?: number | null }

export interface ExecuteOptions {
  signal?: AbortSignal
}
