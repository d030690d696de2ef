import { BaseAgent, type AgentDependencies } from "../../agent/Agent.js";
import { FaqIndex, loadFaqEntries } from "./FaqSearch.js";
import { CUSTOMER_SERVICE_PERSONA } from "./persona.js";
import { TicketStore } from "./TicketStore.js";
import { createTicketTool, searchFaqTool, updateTicketTool } from "./tools.js";

export const CUSTOMER_SERVICE_KIND = "customer_service";

export interface CustomerServiceAgentOptions {
  tickets?: TicketStore;
  faq?: FaqIndex;
  persona?: string;
}

let bundledFaq: FaqIndex | undefined;

/**
 * Support agent with ticketing and FAQ search tools.
 */
export class CustomerServiceAgent extends BaseAgent {
  readonly tickets: TicketStore;

  constructor(deps: AgentDependencies, options: CustomerServiceAgentOptions = {}) {
    const tickets = options.tickets ?? new TicketStore();
    const faq = options.faq ?? (bundledFaq ??= new FaqIndex(loadFaqEntries()));
    super(deps, {
      kind: CUSTOMER_SERVICE_KIND,
      name: "Customer Service Agent",
      persona: options.persona ?? CUSTOMER_SERVICE_PERSONA,
      tools: [createTicketTool(tickets), updateTicketTool(tickets), searchFaqTool(faq)],
    });
    this.tickets = tickets;
  }
}
