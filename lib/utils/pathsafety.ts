/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import AdmZip from 'adm-zip'
import crypto from 'node:crypto'
import fsSync from 'node:fs'
import fs from 'node:fs/promises'
import path_ from 'node:path'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'

/**
 * Real path of `path`, following symlinks of the deepest existing ancestor. Missing trailing
 * segments are appended as they are.
 */
async function realpathDeep(path: string) {
  let current = path_.resolve(path)
  const rest: string[] = []
  while (true) {
    try {
      const real = await fs.realpath(current)
      return path_.join(real, ...rest.reverse())
    } catch (err) {
      const parent = path_.dirname(current)
      if (!isErrno(err, 'ENOENT') || parent === current) throw err
      rest.push(path_.basename(current))
      current = parent
    }
  }
}

function isErrno(err: unknown, code: string) {
  return err instanceof Error && 'code' in err && err.code === code
}

/**
 * Check that `candidate` is `root` or one of its descendants, once both are resolved to absolute
 * real paths.
 * @returns `false` if any of the paths cannot be resolved.
 */
async function isWithin(candidate: string, root: string): Promise<boolean> {
  try {
    const realRoot = await realpathDeep(root)
    const realCandidate = await realpathDeep(candidate)
    const rel = path_.relative(realRoot, realCandidate)
    return rel === '' || (rel !== '..' && !rel.startsWith('..' + path_.sep) && !path_.isAbsolute(rel))
  } catch {
    return false
  }
}

/**
 * Hash a file, streamed.
 * @returns The lower-case hex digest.
 */
function digest(path: string, algorithm: 'sha1' | 'sha256' | 'sha512'): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash(algorithm)
    const stream = fsSync.createReadStream(path)
    stream.on('data', (chunk) => hash.update(chunk))
    stream.on('end', () => resolve(hash.digest('hex')))
    stream.on('error', (err) => reject(new MSMError(ErrorType.FILE_ERROR, `Cannot hash ${path}: ${err.message}`, { path })))
  })
}

/**
 * Replace a file atomically: `writer` writes the new content to a temporary file of the same
 * folder, which is flushed to disk then renamed onto `finalPath`. Readers of `finalPath` see the
 * old content or the new one, never a partial write.
 * @param writer Writes the new content to the given temporary path.
 */
async function atomicReplace(finalPath: string, writer: (tmpPath: string) => Promise<void>) {
  const dir = path_.dirname(finalPath)
  const tmp = path_.join(dir, `.${path_.basename(finalPath)}.${crypto.randomBytes(6).toString('hex')}.tmp`)

  try {
    await writer(tmp)
    const handle = await fs.open(tmp, 'r+')
    try {
      await handle.sync()
    } finally {
      await handle.close()
    }
    await fs.rename(tmp, finalPath)
  } catch (err) {
    await fs.rm(tmp, { force: true })
    if (err instanceof MSMError) throw err
    throw new MSMError(ErrorType.FILE_ERROR, `Cannot write ${finalPath}: ${errorMessage(err)}`, { path: finalPath })
  }
}

async function atomicWriteFile(path: string, data: string | Buffer) {
  await fs.mkdir(path_.dirname(path), { recursive: true })
  await atomicReplace(path, (tmp) => fs.writeFile(tmp, data))
}

/**
 * Extract a zip archive. Every entry is checked before anything is written: if one of them resolves
 * outside `destRoot`, the whole extraction is rejected. If a write fails, everything written by
 * this call is removed.
 * @returns The extracted files (absolute paths).
 */
async function extractArchiveSafely(archive: string, destRoot: string): Promise<string[]> {
  let zip: AdmZip
  try {
    zip = new AdmZip(archive)
  } catch (err) {
    throw new MSMError(ErrorType.FILE_ERROR, `Cannot read archive ${archive}: ${errorMessage(err)}`, { path: archive })
  }

  const root = path_.resolve(destRoot)
  const entries = zip.getEntries().map((entry) => ({ entry, dest: path_.resolve(root, entry.entryName.replace(/\\/g, '/')) }))

  for (const { entry, dest } of entries) {
    if (path_.isAbsolute(entry.entryName) || !(await isWithin(dest, root))) {
      throw new MSMError(ErrorType.PATH_TRAVERSAL, `Archive entry ${entry.entryName} resolves outside ${root}`, { path: entry.entryName })
    }
  }

  const created: string[] = []
  const files: string[] = []
  try {
    const createdRoot = await fs.mkdir(root, { recursive: true })
    if (createdRoot) created.push(createdRoot)

    for (const { entry, dest } of entries) {
      const dir = entry.isDirectory ? dest : path_.dirname(dest)
      const createdDir = await fs.mkdir(dir, { recursive: true })
      if (createdDir) created.push(createdDir)
      if (entry.isDirectory) continue

      await fs.writeFile(dest, entry.getData(), { flag: 'wx' })
      files.push(dest)
    }
  } catch (err) {
    for (const path of [...files, ...created].reverse()) {
      await fs.rm(path, { recursive: true, force: true })
    }
    throw new MSMError(ErrorType.FILE_ERROR, `Cannot extract ${archive}: ${errorMessage(err)}`, { path: archive })
  }

  return files
}

/**
 * Copy a folder recursively. `dest` is created if needed.
 */
async function copyDir(src: string, dest: string) {
  try {
    await fs.cp(src, dest, { recursive: true, errorOnExist: false, force: true })
  } catch (err) {
    throw new MSMError(ErrorType.FILE_ERROR, `Cannot copy ${src} to ${dest}: ${errorMessage(err)}`, { path: src })
  }
}

async function removePath(path: string) {
  await fs.rm(path, { recursive: true, force: true })
}

async function exists(path: string) {
  try {
    await fs.access(path)
    return true
  } catch {
    return false
  }
}

export default { isWithin, digest, atomicReplace, atomicWriteFile, extractArchiveSafely, copyDir, removePath, exists }
