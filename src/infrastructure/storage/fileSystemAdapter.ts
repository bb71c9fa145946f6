import { access, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { constants } from 'node:fs'
import path from 'node:path'
import type { StorageAdapter } from '@/infrastructure/storage/adapter'

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

/** Stores each key as `<key>.bin` under one directory, replacing files through a rename. */
export class FileSystemAdapter implements StorageAdapter {
  readonly name = 'file-system'

  constructor(private readonly directory: string) {}

  private fileFor(key: string): string {
    return path.join(this.directory, `${encodeURIComponent(key)}.bin`)
  }

  async isSupported(): Promise<boolean> {
    try {
      await mkdir(this.directory, { recursive: true })
      await access(this.directory, constants.W_OK)
      return true
    } catch (error) {
      console.warn('[storage] file-system adapter unavailable', this.directory, error)
      return false
    }
  }

  async readBytes(key: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await readFile(this.fileFor(key)))
    } catch (error) {
      if (isMissingFile(error)) {
        return null
      }
      throw error
    }
  }

  async writeBytes(key: string, bytes: Uint8Array): Promise<void> {
    await mkdir(this.directory, { recursive: true })
    const target = this.fileFor(key)
    const staging = `${target}.tmp`
    await writeFile(staging, bytes)
    await rename(staging, target)
  }

  async delete(key: string): Promise<void> {
    await rm(this.fileFor(key), { force: true })
  }
}
