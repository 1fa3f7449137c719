/**
 * Capability Registry
 *
 * Holds exactly one adapter per capability tag. Lookup is typed by tag, so
 * handlers get the adapter's own params and payload types back.
 *
 * Usage:
 *   const registry = new CapabilityRegistry({ general_conversation: chat, ... });
 *   const repo = registry.get('repository_management');
 *   registry.availability();  // for /health
 */

import { CAPABILITY_TAGS, type CapabilityTag } from '../router/types.js';
import { createLogger } from '../utils/logger.js';
import type { ChatParams, ChatPayload } from './chat-adapter.js';
import type { CodeGenerationParams, CodeGenerationPayload } from './code-generation-adapter.js';
import type { PlanningParams, PlanningPayload } from './planning-adapter.js';
import type { RelationalParams, RelationalPayload } from './relational-query-adapter.js';
import type { RepositoryParams, RepositoryPayload } from './repository-adapter.js';
import type { CapabilityAdapter } from './types.js';
import type { WorkflowParams, WorkflowPayload } from './workflow-adapter.js';

const logger = createLogger('CapabilityRegistry');

export interface CapabilityAdapters {
  general_conversation: CapabilityAdapter<ChatParams, ChatPayload>;
  repository_management: CapabilityAdapter<RepositoryParams, RepositoryPayload>;
  code_generation: CapabilityAdapter<CodeGenerationParams, CodeGenerationPayload>;
  planning: CapabilityAdapter<PlanningParams, PlanningPayload>;
  relational_query: CapabilityAdapter<RelationalParams, RelationalPayload>;
  composite_workflow: CapabilityAdapter<WorkflowParams, WorkflowPayload>;
}

export interface CapabilityStatus {
  tag: CapabilityTag;
  service: string;
  available: boolean;
}

export class CapabilityRegistry {
  constructor(private adapters: CapabilityAdapters) {
    for (const tag of CAPABILITY_TAGS) {
      const adapter = adapters[tag];
      if (adapter.tag !== tag) {
        throw new Error(`Adapter for '${adapter.service}' declares tag '${adapter.tag}' but was registered as '${tag}'`);
      }
    }
    logger.info('Registered capability adapters', {
      available: CAPABILITY_TAGS.filter((tag) => adapters[tag].isAvailable()),
    });
  }

  get<T extends CapabilityTag>(tag: T): CapabilityAdapters[T] {
    return this.adapters[tag];
  }

  isAvailable(tag: CapabilityTag): boolean {
    return this.adapters[tag].isAvailable();
  }

  /**
   * Availability of every capability, in canonical tag order.
   */
  availability(): CapabilityStatus[] {
    return CAPABILITY_TAGS.map((tag) => ({
      tag,
      service: this.adapters[tag].service,
      available: this.adapters[tag].isAvailable(),
    }));
  }
}
