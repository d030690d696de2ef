import { v4 as uuidv4 } from "uuid";

export const ISSUE_TYPES = [
  "billing",
  "technical",
  "product",
  "account",
  "order",
  "refund",
  "general",
] as const;
export const PRIORITIES = ["low", "medium", "high", "urgent"] as const;
export const TICKET_STATUSES = [
  "open",
  "in_progress",
  "waiting_for_customer",
  "resolved",
  "closed",
] as const;

export type IssueType = (typeof ISSUE_TYPES)[number];
export type Priority = (typeof PRIORITIES)[number];
export type TicketStatus = (typeof TICKET_STATUSES)[number];

export interface TicketUpdate {
  timestamp: string;
  status: TicketStatus;
  message: string;
  assignedTo?: string;
  resolutionNotes?: string;
}

export interface Ticket {
  ticketId: string;
  createdAt: string;
  status: TicketStatus;
  customerName: string;
  customerEmail: string;
  issueType: IssueType;
  priority: Priority;
  subject: string;
  description: string;
  orderNumber?: string;
  productName?: string;
  assignedTo?: string;
  updates: TicketUpdate[];
}

export type NewTicket = Omit<Ticket, "ticketId" | "createdAt" | "status" | "updates" | "assignedTo">;

export interface TicketChange {
  status: TicketStatus;
  message: string;
  assignedTo?: string;
  resolutionNotes?: string;
}

/**
 * In-process ticket storage owned by one customer-service agent.
 */
export class TicketStore {
  private readonly tickets = new Map<string, Ticket>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  create(input: NewTicket): Ticket {
    const created = this.now();
    const ticketId = `TKT-${formatDay(created)}-${uuidv4().slice(0, 8).toUpperCase()}`;
    const ticket: Ticket = {
      ...input,
      ticketId,
      createdAt: created.toISOString(),
      status: "open",
      updates: [
        {
          timestamp: created.toISOString(),
          status: "open",
          message: `Ticket created: ${input.description}`,
        },
      ],
    };
    this.tickets.set(ticketId, ticket);
    return cloneTicket(ticket);
  }

  get(ticketId: string): Ticket | undefined {
    const ticket = this.tickets.get(ticketId);
    return ticket ? cloneTicket(ticket) : undefined;
  }

  /** Returns undefined when the ticket does not exist. */
  update(ticketId: string, change: TicketChange): Ticket | undefined {
    const ticket = this.tickets.get(ticketId);
    if (!ticket) return undefined;
    ticket.status = change.status;
    if (change.assignedTo) ticket.assignedTo = change.assignedTo;
    ticket.updates.push({
      timestamp: this.now().toISOString(),
      status: change.status,
      message: change.message,
      ...(change.assignedTo ? { assignedTo: change.assignedTo } : {}),
      ...(change.resolutionNotes ? { resolutionNotes: change.resolutionNotes } : {}),
    });
    return cloneTicket(ticket);
  }

  get size(): number {
    return this.tickets.size;
  }
}

function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, "");
}

function cloneTicket(ticket: Ticket): Ticket {
  return { ...ticket, updates: ticket.updates.map((u) => ({ ...u })) };
}
