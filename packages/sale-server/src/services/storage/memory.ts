import type { Deployment, DeploymentSummary, StorageBackend } from '../../types';
import { summarizeDeployment } from './summary';

/**
 * In-memory storage backend (primarily for testing)
 */
export class MemoryBackend implements StorageBackend {
  readonly name = 'memory';
  private deployments = new Map<string, Deployment>();

  async save(deployment: Deployment): Promise<void> {
    // Stored as a copy so callers cannot mutate persisted state in place
    this.deployments.set(deployment.id, structuredClone(deployment));
  }

  async get(id: string): Promise<Deployment | null> {
    const deployment = this.deployments.get(id);
    return deployment ? structuredClone(deployment) : null;
  }

  async delete(id: string): Promise<boolean> {
    return this.deployments.delete(id);
  }

  async list(): Promise<DeploymentSummary[]> {
    return [...this.deployments.values()].map(summarizeDeployment);
  }

  /**
   * Health check - memory backend is always healthy
   */
  async health(): Promise<{ healthy: boolean; error?: string }> {
    return { healthy: true };
  }

  /**
   * Clear all deployments (for test cleanup)
   */
  clearAll(): void {
    this.deployments.clear();
  }
}
