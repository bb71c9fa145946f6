import type { StorageAdapter } from '@/infrastructure/storage/adapter'
import { FileSystemAdapter } from '@/infrastructure/storage/fileSystemAdapter'
import { MemoryAdapter } from '@/infrastructure/storage/memoryAdapter'

export const DEFAULT_DATA_DIR = '.card-league'

export interface SelectedStorage {
  adapter: StorageAdapter
  fallbackChain: string[]
}

export const resolveDataDirectory = (env: NodeJS.ProcessEnv = process.env): string => {
  const configured = env.CARD_LEAGUE_DATA_DIR?.trim()
  return configured ? configured : DEFAULT_DATA_DIR
}

export const selectStorageAdapter = async (
  candidates: StorageAdapter[] = [new FileSystemAdapter(resolveDataDirectory()), new MemoryAdapter()],
): Promise<SelectedStorage> => {
  for (const adapter of candidates) {
    if (await adapter.isSupported()) {
      return {
        adapter,
        fallbackChain: candidates.map((candidate) => candidate.name),
      }
    }
  }

  return {
    adapter: new MemoryAdapter(),
    fallbackChain: candidates.map((candidate) => candidate.name),
  }
}
