import type { StorageAdapter } from '@/infrastructure/storage/adapter'

export class MemoryAdapter implements StorageAdapter {
  readonly name = 'memory'
  private readonly entries = new Map<string, Uint8Array>()

  async isSupported(): Promise<boolean> {
    return true
  }

  async readBytes(key: string): Promise<Uint8Array | null> {
    const bytes = this.entries.get(key)
    return bytes ? bytes.slice() : null
  }

  async writeBytes(key: string, bytes: Uint8Array): Promise<void> {
    this.entries.set(key, bytes.slice())
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key)
  }
}
