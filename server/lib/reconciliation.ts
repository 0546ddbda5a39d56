import type { IStorage } from "../storage";
import { errorMessage } from "./errors";
import { attributeText, type ExternalTicket, type ExternalTicketClient } from "./external-tickets";
import { log, logError, logWarn } from "./logger";
import type { ExternalOutcome, TicketLifecycle } from "./ticket-lifecycle";

export interface ReconciliationConfig {
  pollIntervalMs: number;
  closedStatusId: number;
  outcomeAttributeId: number;
  commentAttributeId: number;
  /** Attribute carrying shipment tracking; null when the helpdesk has none. */
  trackingAttributeId: number | null;
  approvedMarker: string;
  rejectedMarker: string;
}

export interface ReconciliationReport {
  checked: number;
  resolved: number;
  unchanged: number;
  failed: number;
}

/**
 * Polls the external helpdesk for tickets forwarded to it and folds closed
 * outcomes back into local state. Passes never overlap, and no ticket is
 * locked while the external call is in flight.
 */
export class ReconciliationSync {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<ReconciliationReport> | null = null;
  private controller = new AbortController();

  constructor(
    private readonly storage: IStorage,
    private readonly lifecycle: TicketLifecycle,
    private readonly client: ExternalTicketClient,
    private readonly config: ReconciliationConfig,
  ) {}

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start() {
    if (this.timer) return;
    this.controller = new AbortController();
    this.timer = setInterval(async () => {
      if (this.inFlight) {
        logWarn("Previous reconciliation pass still running, tick skipped", "sync");
        return;
      }
      try {
        const report = await this.runOnce();
        if (report.resolved > 0 || report.failed > 0) {
          log(`Reconciled ${report.checked} tickets: ${report.resolved} resolved, ${report.failed} failed`, "sync");
        }
      } catch (err) {
        logError("Reconciliation pass failed", err, "sync");
      }
    }, this.config.pollIntervalMs);
    log(`External reconciliation started (every ${Math.round(this.config.pollIntervalMs / 1000)}s)`, "sync");
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller.abort();

    const pending = this.inFlight;
    if (pending) {
      try {
        await pending;
      } catch (err) {
        logError("Reconciliation pass failed during shutdown", err, "sync");
      }
    }
    log("External reconciliation stopped", "sync");
  }

  /** Runs one pass. A call made while a pass is in flight joins that pass. */
  runOnce(): Promise<ReconciliationReport> {
    if (this.inFlight) return this.inFlight;
    if (!this.timer && this.controller.signal.aborted) {
      this.controller = new AbortController();
    }

    const pass = this.reconcile(this.controller.signal).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = pass;
    return pass;
  }

  outcomeOf(ticket: ExternalTicket): ExternalOutcome | null {
    const text = attributeText(ticket, this.config.outcomeAttributeId);
    if (!text) return null;
    if (text.includes(this.config.approvedMarker)) return "approved";
    if (text.includes(this.config.rejectedMarker)) return "rejected";
    return null;
  }

  private async reconcile(signal: AbortSignal): Promise<ReconciliationReport> {
    const report: ReconciliationReport = { checked: 0, resolved: 0, unchanged: 0, failed: 0 };
    const candidates = await this.storage.getExternallyLinkedOpenTickets();

    for (const ticket of candidates) {
      if (signal.aborted) break;
      const externalTicketId = ticket.externalRef?.ninjaTicketId;
      if (!externalTicketId) continue;

      report.checked++;
      try {
        const external = await this.client.getTicket(externalTicketId, signal);
        if (external.statusId !== this.config.closedStatusId) {
          report.unchanged++;
          continue;
        }

        const outcome = this.outcomeOf(external);
        if (!outcome) {
          if (await this.lifecycle.noteUnresolvedExternal(ticket.id, externalTicketId)) {
            logWarn(`External ticket ${externalTicketId} closed without a readable outcome; ticket #${ticket.id} left open`, "sync");
          }
          report.unchanged++;
          continue;
        }

        const comment = attributeText(external, this.config.commentAttributeId) ?? undefined;
        const tracking = this.config.trackingAttributeId === null
          ? undefined
          : attributeText(external, this.config.trackingAttributeId) ?? undefined;
        const applied = await this.lifecycle.applyExternalResolution(ticket.id, { externalTicketId, outcome, comment, tracking });
        if (applied) {
          report.resolved++;
          log(`Ticket #${ticket.id} ${outcome} by external ticket ${externalTicketId}`, "sync");
        } else {
          report.unchanged++;
        }
      } catch (err) {
        report.failed++;
        logWarn(`Ticket #${ticket.id} (external ${externalTicketId}) not reconciled: ${errorMessage(err)}`, "sync");
      }
    }

    return report;
  }
}
