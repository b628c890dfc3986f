import { LRUCache } from 'lru-cache';
import { mkdir, readdir, readFile, writeFile, unlink, access } from 'node:fs/promises';
import { join, resolve, sep } from 'node:path';
import type { Deployment, DeploymentSummary, StorageBackend } from '../../types';
import { summarizeDeployment } from './summary';

/**
 * Filesystem-based storage backend with LRU cache
 */
export class FilesystemBackend implements StorageBackend {
  readonly name = 'filesystem';
  private cache: LRUCache<string, Deployment>;

  constructor(private dataDir: string) {
    // LRU cache with max 100 deployments, TTL of 1 hour
    this.cache = new LRUCache<string, Deployment>({
      max: 100,
      ttl: 1000 * 60 * 60,
    });
  }

  /**
   * Validate deployment ID to prevent path traversal attacks
   * @throws Error if ID is invalid or attempts path traversal
   */
  private validateId(id: string): void {
    // Only allow UUID-like IDs (alphanumeric + hyphens)
    if (!/^[a-zA-Z0-9-]+$/.test(id)) {
      throw new Error('Invalid deployment ID format');
    }

    const fullPath = resolve(this.dataDir, `${id}.json`);
    if (!fullPath.startsWith(resolve(this.dataDir) + sep)) {
      throw new Error('Invalid deployment ID');
    }
  }

  private async ensureDataDir(): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
  }

  private getDeploymentPath(id: string): string {
    return join(this.dataDir, `${id}.json`);
  }

  async save(deployment: Deployment): Promise<void> {
    this.validateId(deployment.id);
    await this.ensureDataDir();
    await writeFile(this.getDeploymentPath(deployment.id), JSON.stringify(deployment, null, 2));
    this.cache.set(deployment.id, structuredClone(deployment));
  }

  async get(id: string): Promise<Deployment | null> {
    this.validateId(id);

    const cached = this.cache.get(id);
    if (cached) {
      return structuredClone(cached);
    }

    let data: string;
    try {
      data = await readFile(this.getDeploymentPath(id), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    // Snapshot contents are validated when the devnet is imported
    const deployment: Deployment = JSON.parse(data);
    this.cache.set(id, deployment);
    return structuredClone(deployment);
  }

  async delete(id: string): Promise<boolean> {
    this.validateId(id);
    this.cache.delete(id);

    try {
      await unlink(this.getDeploymentPath(id));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * List all deployments (summaries only)
   */
  async list(): Promise<DeploymentSummary[]> {
    await this.ensureDataDir();

    const files = await readdir(this.dataDir);
    const summaries: DeploymentSummary[] = [];

    for (const file of files) {
      if (!file.endsWith('.json')) continue;

      const id = file.replace('.json', '');
      try {
        const deployment = await this.get(id);
        if (deployment) {
          summaries.push(summarizeDeployment(deployment));
        }
      } catch (error) {
        console.warn(
          `Skipping unreadable deployment ${file}:`,
          error instanceof Error ? error.message : 'Unknown error'
        );
      }
    }

    return summaries;
  }

  async health(): Promise<{ healthy: boolean; error?: string }> {
    try {
      await access(this.dataDir);
      return { healthy: true };
    } catch (error) {
      return {
        healthy: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * Clear the cache (useful for testing)
   */
  clearCache(): void {
    this.cache.clear();
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
