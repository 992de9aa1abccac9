import { appLogger, type AppLogger } from "../observability/logger.js";
import { activeSessionGauge } from "../observability/metrics.js";
import type { ApplicationType, ReadonlyApplicationConfig } from "../schemas/ApplicationConfig.js";
import type { OrchestratorModule, VirtualHost } from "./Orchestrator.js";

export class ApplicationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ApplicationError";
  }
}

export type Application = {
  /** Fully qualified name, `#<vhost>#<app>`. */
  readonly id: string;
  readonly vhostName: string;
  readonly name: string;
  readonly type: ApplicationType;
  readonly config: ReadonlyApplicationConfig;
  readonly sessions: number;
};

type ApplicationRecord = {
  id: string;
  vhostName: string;
  name: string;
  type: ApplicationType;
  config: ReadonlyApplicationConfig;
  sessions: number;
};

export function applicationId(vhostName: string, appName: string): string {
  return `#${vhostName}#${appName}`;
}

function toApplication(record: ApplicationRecord): Application {
  return { ...record };
}

/**
 * Keeps the applications of every virtual host and the sessions open on them.
 * A host with open sessions cannot be deleted.
 */
export class ApplicationRegistry implements OrchestratorModule {
  readonly name = "applications";
  private readonly hosts = new Map<string, Map<string, ApplicationRecord>>();
  private readonly logger: AppLogger;

  constructor(options: { logger?: AppLogger } = {}) {
    this.logger = (options.logger ?? appLogger).child({ component: "ApplicationRegistry" });
  }

  onVirtualHostCreated(host: VirtualHost): void {
    const applications = new Map<string, ApplicationRecord>();
    for (const item of host.config.applications.items) {
      const config = item.node;
      const name = config.name.value.trim();
      if (!name) {
        throw new ApplicationError(`Virtual host ${host.name} has an application without a name`);
      }
      if (applications.has(name)) {
        throw new ApplicationError(`Application ${applicationId(host.name, name)} is defined twice`);
      }
      applications.set(name, {
        id: applicationId(host.name, name),
        vhostName: host.name,
        name,
        type: config.type.value,
        config,
        sessions: 0,
      });
    }
    this.hosts.set(host.name, applications);
    this.logger.debug(
      { vhost: host.name, applications: [...applications.keys()] },
      "applications created",
    );
  }

  onVirtualHostDeleting(host: VirtualHost): void {
    const sessions = this.countSessions(host.name);
    if (sessions > 0) {
      throw new ApplicationError(`Virtual host ${host.name} has ${sessions} active session(s)`);
    }
  }

  onVirtualHostDeleted(host: VirtualHost): void {
    this.hosts.delete(host.name);
    activeSessionGauge.remove(host.name);
  }

  getApplication(vhostName: string, appName: string): Application | undefined {
    const record = this.hosts.get(vhostName)?.get(appName);
    return record ? toApplication(record) : undefined;
  }

  listApplications(vhostName: string): Application[] {
    return [...(this.hosts.get(vhostName)?.values() ?? [])].map(toApplication);
  }

  /**
   * @returns the number of sessions now open on the application
   * @throws ApplicationError when the application does not exist
   */
  openSession(vhostName: string, appName: string): number {
    const record = this.requireRecord(vhostName, appName);
    record.sessions += 1;
    this.updateGauge(vhostName);
    return record.sessions;
  }

  closeSession(vhostName: string, appName: string): number {
    const record = this.requireRecord(vhostName, appName);
    if (record.sessions === 0) {
      this.logger.warn({ application: record.id }, "session closed on an idle application");
      return 0;
    }
    record.sessions -= 1;
    this.updateGauge(vhostName);
    return record.sessions;
  }

  countSessions(vhostName: string): number {
    let total = 0;
    for (const record of this.hosts.get(vhostName)?.values() ?? []) {
      total += record.sessions;
    }
    return total;
  }

  private requireRecord(vhostName: string, appName: string): ApplicationRecord {
    const record = this.hosts.get(vhostName)?.get(appName);
    if (!record) {
      throw new ApplicationError(`Application ${applicationId(vhostName, appName)} does not exist`);
    }
    return record;
  }

  private updateGauge(vhostName: string): void {
    activeSessionGauge.labels(vhostName).set(this.countSessions(vhostName));
  }
}
