import { z } from "zod";
import { TicketError, errorMessage } from "./errors";

export interface ExternalAttribute {
  id: number;
  value: unknown;
}

export interface ExternalTicket {
  id: number;
  statusId: number | null;
  attributes: ExternalAttribute[];
}

/** Read-only view of the external helpdesk. */
export interface ExternalTicketClient {
  getTicket(externalId: number, signal?: AbortSignal): Promise<ExternalTicket>;
}

// The helpdesk reports attributeId either as a number or as { id }
const attributeValueSchema = z
  .object({
    attributeId: z.union([z.number().int(), z.object({ id: z.number().int() }).passthrough()]),
    value: z.unknown().optional(),
  })
  .passthrough();

const externalTicketSchema = z
  .object({
    status: z.object({ statusId: z.number().int() }).passthrough().nullish(),
    attributeValues: z.array(attributeValueSchema).nullish(),
  })
  .passthrough();

export function toExternalTicket(externalId: number, payload: unknown): ExternalTicket {
  const parsed = externalTicketSchema.safeParse(payload);
  if (!parsed.success) {
    throw TicketError.invalidPayload(`Malformed external ticket ${externalId}`, {
      externalId,
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }

  return {
    id: externalId,
    statusId: parsed.data.status?.statusId ?? null,
    attributes: (parsed.data.attributeValues ?? []).map((attr) => ({
      id: typeof attr.attributeId === "number" ? attr.attributeId : attr.attributeId.id,
      value: attr.value,
    })),
  };
}

export function attributeText(ticket: ExternalTicket, attributeId: number): string | null {
  const attr = ticket.attributes.find((a) => a.id === attributeId);
  if (!attr || attr.value === null || attr.value === undefined) return null;
  return typeof attr.value === "string" ? attr.value : String(attr.value);
}

export interface HttpExternalTicketClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

export class HttpExternalTicketClient implements ExternalTicketClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpExternalTicketClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getTicket(externalId: number, signal?: AbortSignal): Promise<ExternalTicket> {
    const url = `${this.options.baseUrl}/api/v2/ticketing/ticket/${externalId}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
          Authorization: `Bearer ${this.options.token}`,
        },
        signal: controller.signal,
      });
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${this.options.timeoutMs}ms` : errorMessage(error);
      throw new TicketError("ExternalSyncTransient", `External ticket ${externalId}: ${reason}`, { externalId }, { cause: error });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }

    if (!response.ok) {
      throw new TicketError("ExternalSyncTransient", `External ticket ${externalId}: HTTP ${response.status}`, {
        externalId,
        status: response.status,
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw TicketError.invalidPayload(`External ticket ${externalId}: response is not JSON`, { externalId });
    }
    return toExternalTicket(externalId, payload);
  }
}
