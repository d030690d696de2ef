import { UnknownAgentKindError } from "../core/errors.js";
import { CustomerServiceAgent, CUSTOMER_SERVICE_KIND } from "../agents/customer-service/CustomerServiceAgent.js";
import type { Agent, AgentDependencies } from "./Agent.js";

export type AgentFactory = (deps: AgentDependencies) => Agent;

export interface AgentKindInfo {
  kind: string;
  description: string;
}

/**
 * Lookup table from agent type tag to constructor.
 * Open for extension: new kinds are registered, nothing is edited.
 */
export class AgentKindRegistry {
  private readonly kinds = new Map<string, { factory: AgentFactory; description: string }>();

  register(kind: string, factory: AgentFactory, description = ""): this {
    if (this.kinds.has(kind)) {
      throw new Error(`Agent kind "${kind}" is already registered`);
    }
    this.kinds.set(kind, { factory, description });
    return this;
  }

  has(kind: string): boolean {
    return this.kinds.has(kind);
  }

  /** Throws UnknownAgentKindError for an unregistered kind. */
  create(kind: string, deps: AgentDependencies): Agent {
    const entry = this.kinds.get(kind);
    if (!entry) {
      throw new UnknownAgentKindError(kind, [...this.kinds.keys()]);
    }
    return entry.factory(deps);
  }

  list(): AgentKindInfo[] {
    return [...this.kinds.entries()].map(([kind, { description }]) => ({ kind, description }));
  }
}

/**
 * The kinds shipped with the runtime.
 */
export function createDefaultAgentKinds(): AgentKindRegistry {
  return new AgentKindRegistry().register(
    CUSTOMER_SERVICE_KIND,
    (deps) => new CustomerServiceAgent(deps),
    "Support agent: FAQ search, ticket creation and ticket updates",
  );
}
