/**
 * Capability Registry — registration and discovery of agent capabilities.
 */

import type { AgentStatus, CapabilityRecord, Result } from '../core/types.js';
import { fail, ok } from '../core/types.js';
import type { CapabilityDirectory, IdentityResolution, IdentityValidator } from '../collaborators/types.js';

export type CapabilityRegistration = Omit<CapabilityRecord, 'activeTasks' | 'status'> &
  Partial<Pick<CapabilityRecord, 'activeTasks' | 'status'>>;

/**
 * In-memory capability registry.
 * Registration checks the identity first; discovery keeps registration order.
 */
export class CapabilityRegistry implements CapabilityDirectory {
  private records: Map<string, CapabilityRecord> = new Map();

  constructor(private identity: IdentityValidator) {}

  /**
   * Register or replace an agent's capabilities.
   */
  async register(agentId: string, registration: CapabilityRegistration): Promise<Result<CapabilityRecord>> {
    let resolved: IdentityResolution;
    try {
      resolved = await this.identity.resolve(agentId);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return fail('InternalError', `Identity lookup for ${agentId} failed: ${message}`);
    }
    if (!resolved.exists) return fail('UnknownAgent', `Agent ${agentId} not found`);
    if (!resolved.isAgent) return fail('NotAnAgent', `${agentId} is not an agent`);

    if (!Number.isInteger(registration.maxConcurrentTasks) || registration.maxConcurrentTasks < 1) {
      return fail('InvalidArgument', 'maxConcurrentTasks must be a positive integer');
    }

    const record: CapabilityRecord = {
      ...registration,
      services: [...registration.services],
      skills: [...registration.skills],
      pricing: { ...registration.pricing },
      status: registration.status ?? 'Available',
      activeTasks: registration.activeTasks ?? 0,
    };
    // Re-registration keeps the original discovery position.
    this.records.set(agentId, record);
    return ok(copy(record));
  }

  lookup(agentId: string): Result<CapabilityRecord> {
    const record = this.records.get(agentId);
    if (!record) return fail('NotFound', `No capabilities registered for agent ${agentId}`);
    return ok(copy(record));
  }

  /**
   * Available agents offering the service with a free task slot.
   */
  findByService(serviceName: string): string[] {
    const results: string[] = [];
    for (const [agentId, record] of this.records) {
      if (
        record.status === 'Available' &&
        record.activeTasks < record.maxConcurrentTasks &&
        record.services.includes(serviceName)
      ) {
        results.push(agentId);
      }
    }
    return results;
  }

  /** Case-insensitive skill match over Available agents. */
  findBySkill(skill: string): string[] {
    const wanted = skill.toLowerCase();
    const results: string[] = [];
    for (const [agentId, record] of this.records) {
      if (record.status !== 'Available') continue;
      if (record.skills.some(s => s.toLowerCase() === wanted)) results.push(agentId);
    }
    return results;
  }

  /** Available agents with a free task slot, in registration order. */
  listAvailable(): string[] {
    return Array.from(this.records)
      .filter(([, record]) => record.status === 'Available' && record.activeTasks < record.maxConcurrentTasks)
      .map(([agentId]) => agentId);
  }

  updateStatus(agentId: string, status: AgentStatus): Result<CapabilityRecord> {
    const record = this.records.get(agentId);
    if (!record) return fail('NotFound', `No capabilities registered for agent ${agentId}`);
    record.status = status;
    return ok(copy(record));
  }

  updateActiveTasks(agentId: string, activeTasks: number): Result<CapabilityRecord> {
    const record = this.records.get(agentId);
    if (!record) return fail('NotFound', `No capabilities registered for agent ${agentId}`);
    if (!Number.isInteger(activeTasks) || activeTasks < 0) {
      return fail('InvalidArgument', 'activeTasks must be a non-negative integer');
    }
    record.activeTasks = activeTasks;
    return ok(copy(record));
  }

  unregister(agentId: string): boolean {
    return this.records.delete(agentId);
  }
}

function copy(record: CapabilityRecord): CapabilityRecord {
  return {
    ...record,
    services: [...record.services],
    skills: [...record.skills],
    pricing: { ...record.pricing },
  };
}
