/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import path_ from 'node:path'
import type { Config, FullConfig } from '../../types/config'
import { MSMError, ErrorType } from '../../types/errors'
import { detectDeployment, type DeploymentCollaborators, type DeploymentLayout } from './deployment'

const HOUR = 60 * 60 * 1000

/**
 * Normalise the user configuration and select the deployment layout.
 * @returns The configuration with every default applied, and the deployment layout.
 */
export function resolveConfig(config: Config, collaborators: DeploymentCollaborators = {}): { config: FullConfig; deployment: DeploymentLayout } {
  if (!config.serversRoot) throw new MSMError(ErrorType.CONFIG_ERROR, 'serversRoot is required')

  const appDir = path_.resolve(config.appDir ?? path_.dirname(process.execPath))
  const deployment = detectDeployment(appDir, config.dataDir, {
    swapper: config.swapper,
    installerLauncher: config.installerLauncher,
    ...collaborators
  })
  const serversRoot = path_.resolve(config.serversRoot)

  const owner = config.releases?.owner ?? ''
  const repo = config.releases?.repo ?? ''
  const url = config.releases?.url ?? (owner && repo ? `https://api.github.com/repos/${owner}/${repo}/releases` : '')

  const full: FullConfig = {
    serversRoot,
    appDir,
    appVersion: config.appVersion ?? '0.0.0',
    logLevel: config.logLevel ?? 'info',
    mode: deployment.mode,
    dataDir: deployment.dataDir,
    cacheDir: deployment.cacheDir,
    registryFile: path_.join(serversRoot, 'servers_config.json'),
    releases: {
      owner,
      repo,
      url,
      includePrerelease: config.releases?.includePrerelease ?? false,
      allowInstallerFallback: config.releases?.allowInstallerFallback ?? false
    },
    timeouts: {
      http: positive(config.timeouts?.http, 15000, 'timeouts.http'),
      stop: positive(config.timeouts?.stop, 10000, 'timeouts.stop')
    },
    catalog: {
      maxAge: positive(config.catalog?.maxAge, 6 * HOUR, 'catalog.maxAge'),
      staleLimit: positive(config.catalog?.staleLimit, 30 * 24 * HOUR, 'catalog.staleLimit')
    },
    pollInterval: positive(config.pollInterval, 1000, 'pollInterval'),
    outputQueueSize: positive(config.outputQueueSize, 1000, 'outputQueueSize')
  }

  return { config: full, deployment }
}

function positive(value: number | undefined, fallback: number, name: string) {
  if (value === undefined) return fallback
  if (!Number.isFinite(value) || value <= 0) throw new MSMError(ErrorType.CONFIG_ERROR, `${name} must be a positive number`)
  return value
}
