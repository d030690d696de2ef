import type { AgentTool } from "../../types/ToolSpec.js";
import type { FaqIndex } from "./FaqSearch.js";
import {
  ISSUE_TYPES,
  PRIORITIES,
  TICKET_STATUSES,
  type IssueType,
  type Priority,
  type TicketStatus,
  type TicketStore,
} from "./TicketStore.js";

// Arguments reach handlers already validated against the schemas below.
const str = (args: Record<string, unknown>, key: string): string => String(args[key] ?? "");
const optionalStr = (args: Record<string, unknown>, key: string): string | undefined =>
  typeof args[key] === "string" && args[key] !== "" ? String(args[key]) : undefined;

function oneOf<T extends string>(values: readonly T[], raw: unknown, fallback: T): T {
  return values.find((v) => v === raw) ?? fallback;
}

export function createTicketTool(tickets: TicketStore): AgentTool {
  return {
    spec: {
      name: "create_ticket",
      description:
        "Create a support ticket for an issue that cannot be resolved in the conversation. " +
        "Collect the customer's name, email, issue type, priority, a subject and a description first.",
      parameters: {
        type: "object",
        properties: {
          customer_name: { type: "string", minLength: 1, description: "Customer's full name" },
          customer_email: { type: "string", format: "email", description: "Customer's email address" },
          issue_type: { type: "string", enum: [...ISSUE_TYPES] },
          priority: { type: "string", enum: [...PRIORITIES] },
          subject: { type: "string", minLength: 1, description: "Short summary of the issue" },
          description: { type: "string", minLength: 1, description: "Detailed description of the issue" },
          order_number: { type: "string", description: "Related order number, if any" },
          product_name: { type: "string", description: "Related product, if any" },
        },
        required: [
          "customer_name",
          "customer_email",
          "issue_type",
          "priority",
          "subject",
          "description",
        ],
        additionalProperties: false,
      },
    },
    handler: (args) => {
      const priority: Priority = oneOf(PRIORITIES, args.priority, "medium");
      const issueType: IssueType = oneOf(ISSUE_TYPES, args.issue_type, "general");
      const ticket = tickets.create({
        customerName: str(args, "customer_name"),
        customerEmail: str(args, "customer_email"),
        issueType,
        priority,
        subject: str(args, "subject"),
        description: str(args, "description"),
        orderNumber: optionalStr(args, "order_number"),
        productName: optionalStr(args, "product_name"),
      });
      return {
        success: true,
        ticket_id: ticket.ticketId,
        message: `Support ticket ${ticket.ticketId} has been created successfully.`,
        ticket_details: {
          id: ticket.ticketId,
          status: ticket.status,
          priority: ticket.priority,
          issue_type: ticket.issueType,
          subject: ticket.subject,
          estimated_response_time:
            priority === "high" || priority === "urgent" ? "2-4 hours" : "24 hours",
        },
      };
    },
  };
}

export function updateTicketTool(tickets: TicketStore): AgentTool {
  return {
    spec: {
      name: "update_ticket",
      description: "Update the status of an existing support ticket and record a note.",
      parameters: {
        type: "object",
        properties: {
          ticket_id: { type: "string", pattern: "^TKT-", description: "Ticket id, e.g. TKT-20240101-AB12CD34" },
          status: { type: "string", enum: [...TICKET_STATUSES] },
          update_message: { type: "string", minLength: 1 },
          assigned_to: { type: "string" },
          resolution_notes: { type: "string" },
        },
        required: ["ticket_id", "status", "update_message"],
        additionalProperties: false,
      },
    },
    handler: (args) => {
      const ticketId = str(args, "ticket_id");
      const status: TicketStatus = oneOf(TICKET_STATUSES, args.status, "open");
      const updated = tickets.update(ticketId, {
        status,
        message: str(args, "update_message"),
        assignedTo: optionalStr(args, "assigned_to"),
        resolutionNotes: optionalStr(args, "resolution_notes"),
      });
      if (!updated) {
        return {
          success: false,
          error: "Ticket not found",
          message: `Ticket ${ticketId} was not found in our system.`,
        };
      }
      const last = updated.updates[updated.updates.length - 1];
      return {
        success: true,
        ticket_id: ticketId,
        message: `Ticket ${ticketId} has been updated successfully.`,
        updated_details: {
          id: ticketId,
          new_status: updated.status,
          update_message: last.message,
          last_updated: last.timestamp,
        },
      };
    },
  };
}

export function searchFaqTool(faq: FaqIndex): AgentTool {
  return {
    spec: {
      name: "search_faq",
      description:
        "Search the FAQ knowledge base. Use it before creating a ticket for common questions.",
      parameters: {
        type: "object",
        properties: {
          query: { type: "string", minLength: 1, description: "The customer's question or keywords" },
          category: { type: "string", enum: ["all", ...faq.categories], default: "all" },
          max_results: { type: "integer", minimum: 1, maximum: 10, default: 3 },
        },
        required: ["query"],
        additionalProperties: false,
      },
    },
    handler: (args) => {
      const query = str(args, "query");
      const matches = faq.search(query, {
        category: str(args, "category") || "all",
        limit: typeof args.max_results === "number" ? args.max_results : 3,
      });
      return {
        success: true,
        query,
        results_count: matches.length,
        results: matches.map((m) => ({
          question: m.question,
          answer: m.answer,
          category: m.category,
          tags: m.tags,
          relevance_score: m.relevanceScore,
        })),
        message:
          matches.length > 0
            ? `Found ${matches.length} relevant FAQ entries.`
            : "No FAQ entry matched the question. Offer to create a support ticket instead.",
      };
    },
  };
}
