import type { AppConfig } from "./config";
import type { IStorage } from "./storage";
import { HistoryLog } from "./lib/history";
import { OverviewGroup } from "./lib/overview-group";
import { PermissionStore } from "./lib/permissions";
import { WorkflowBuilder } from "./lib/workflow-builder";
import { WorkflowEngine } from "./lib/workflow-engine";
import { TicketLifecycle } from "./lib/ticket-lifecycle";
import { HttpExternalTicketClient, type ExternalTicketClient } from "./lib/external-tickets";
import { ReconciliationSync } from "./lib/reconciliation";

export interface Services {
  storage: IStorage;
  permissions: PermissionStore;
  history: HistoryLog;
  overview: OverviewGroup;
  builder: WorkflowBuilder;
  engine: WorkflowEngine;
  lifecycle: TicketLifecycle;
  sync: ReconciliationSync | null;
}

export interface ServiceOptions {
  now?: () => Date;
  externalClient?: ExternalTicketClient;
}

export function createServices(
  storage: IStorage,
  config: Pick<AppConfig, "departmentNames" | "external">,
  options: ServiceOptions = {},
): Services {
  const permissions = new PermissionStore(storage);
  const history = new HistoryLog(storage, options.now);
  const overview = new OverviewGroup(storage);
  const builder = new WorkflowBuilder(config.departmentNames, options.now);
  const engine = new WorkflowEngine(storage, builder);
  const lifecycle = new TicketLifecycle({ storage, permissions, engine, history, overview, now: options.now });

  let sync: ReconciliationSync | null = null;
  if (config.external) {
    const client = options.externalClient ?? new HttpExternalTicketClient({
      baseUrl: config.external.baseUrl,
      token: config.external.token,
      timeoutMs: config.external.timeoutMs,
    });
    sync = new ReconciliationSync(storage, lifecycle, client, config.external);
  }

  return { storage, permissions, history, overview, builder, engine, lifecycle, sync };
}
