import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import { startReconfiguration, virtualHostGauge, type ReconfigurationOperation } from "../observability/metrics.js";
import { hostNamesOf } from "../schemas/HostConfig.js";
import type { ReadonlyVirtualHostConfig, VirtualHostConfig } from "../schemas/VirtualHostConfig.js";
import { errorMessage } from "../utils/errorUtils.js";
import { FrozenMutationError } from "../values/Value.js";

export type ReconfigurationResult = "succeeded" | "already_exists" | "not_found" | "failed";

export type ReconfigurationOutcome = {
  result: ReconfigurationResult;
  /** Why a `failed` or conflicting request was not applied. */
  reason?: string;
  /** The affected host; absent for `not_found` and for creation conflicts. */
  host?: VirtualHost;
};

/** `document` hosts come from the server document, `api` hosts from the admin API. */
export type VirtualHostOrigin = "document" | "api";

export type VirtualHost = {
  readonly name: string;
  readonly config: ReadonlyVirtualHostConfig;
  readonly origin: VirtualHostOrigin;
  /** Read-only hosts cannot be deleted at run time. */
  readonly isReadOnly: boolean;
  readonly hostNames: readonly string[];
  readonly createdAt: Date;
};

/**
 * A component that owns per-host resources. Creation hooks run in registration
 * order; deletion hooks in reverse.
 */
export interface OrchestratorModule {
  readonly name: string;
  /** Throwing aborts the creation; modules notified before are rolled back. */
  onVirtualHostCreated(host: VirtualHost): void | Promise<void>;
  /** Throwing vetoes the deletion. */
  onVirtualHostDeleting?(host: VirtualHost): void | Promise<void>;
  onVirtualHostDeleted(host: VirtualHost): void | Promise<void>;
}

export type CreateVirtualHostOptions = {
  origin?: VirtualHostOrigin;
  /** Defaults to true for `document` hosts and false for `api` hosts. */
  readOnly?: boolean;
};

type OrchestratorOptions = {
  logger?: AppLogger;
  now?: () => Date;
};

/**
 * Owns the virtual host topology. Readers get the current snapshot without
 * waiting; writers are applied one at a time and publish a new snapshot only
 * once every module accepted the change.
 */
export class Orchestrator {
  private hosts: ReadonlyMap<string, VirtualHost> = new Map();
  private readonly modules: OrchestratorModule[] = [];
  private writeChain: Promise<void> = Promise.resolve();
  private readonly logger: AppLogger;
  private readonly now: () => Date;

  constructor(options: OrchestratorOptions = {}) {
    this.logger = (options.logger ?? appLogger).child({ component: "Orchestrator" });
    this.now = options.now ?? (() => new Date());
  }

  registerModule(module: OrchestratorModule): void {
    this.modules.push(module);
  }

  getVirtualHost(name: string): VirtualHost | undefined {
    return this.hosts.get(name);
  }

  listVirtualHosts(): VirtualHost[] {
    return [...this.hosts.values()];
  }

  snapshot(): ReadonlyMap<string, VirtualHost> {
    return this.hosts;
  }

  findByHostName(hostName: string): VirtualHost | undefined {
    const wanted = hostName.trim().toLowerCase();
    return this.listVirtualHosts().find((host) => host.hostNames.includes(wanted));
  }

  /**
   * Adds a virtual host built from `definition`. The definition is copied and
   * the copy frozen; the caller keeps a mutable definition.
   *
   * @throws FrozenMutationError when `definition` is already read-only
   */
  createVirtualHost(
    definition: VirtualHostConfig,
    options: CreateVirtualHostOptions = {},
  ): Promise<ReconfigurationOutcome> {
    if (definition.isReadOnly()) {
      throw new FrozenMutationError("virtual host definition");
    }
    const config = definition.copy().freeze();
    return this.enqueue("create", () => this.applyCreate(config, options));
  }

  deleteVirtualHost(name: string): Promise<ReconfigurationOutcome> {
    return this.enqueue("delete", () => this.applyDelete(name));
  }

  private enqueue(
    operation: ReconfigurationOperation,
    task: () => Promise<ReconfigurationOutcome>,
  ): Promise<ReconfigurationOutcome> {
    const run = this.writeChain.then(async () => {
      const finish = startReconfiguration(operation);
      let result = "error";
      try {
        const outcome = await this.settle(operation, task);
        result = outcome.result;
        return outcome;
      } finally {
        finish(result);
      }
    });
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /**
   * Runs a write and reports anything it throws as `failed`. A mutation of a
   * published tree is a programming error and still propagates.
   */
  private async settle(
    operation: ReconfigurationOperation,
    task: () => Promise<ReconfigurationOutcome>,
  ): Promise<ReconfigurationOutcome> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof FrozenMutationError) {
        throw error;
      }
      this.logger.error({ operation, err: normalizeError(error) }, "virtual host reconfiguration failed");
      return { result: "failed", reason: errorMessage(error) };
    }
  }

  private async applyCreate(
    config: ReadonlyVirtualHostConfig,
    options: CreateVirtualHostOptions,
  ): Promise<ReconfigurationOutcome> {
    const name = config.name.value.trim();
    if (!name) {
      return this.refuse("create", name, "failed", "Virtual host name is required");
    }
    if (this.hosts.has(name)) {
      return this.refuse("create", name, "already_exists", `Virtual host ${name} already exists`);
    }

    const hostNames = hostNamesOf(config.host.node);
    for (const hostName of hostNames) {
      const owner = this.findByHostName(hostName);
      if (owner) {
        return this.refuse(
          "create",
          name,
          "failed",
          `Host name ${hostName} is already used by virtual host ${owner.name}`,
        );
      }
    }

    const origin = options.origin ?? "api";
    const host: VirtualHost = Object.freeze({
      name,
      config,
      origin,
      isReadOnly: options.readOnly ?? origin === "document",
      hostNames: Object.freeze(hostNames),
      createdAt: this.now(),
    });

    const notified: OrchestratorModule[] = [];
    for (const module of this.modules) {
      try {
        await module.onVirtualHostCreated(host);
        notified.push(module);
      } catch (error) {
        this.logger.warn(
          { vhost: name, module: module.name, err: normalizeError(error) },
          "module rejected virtual host; rolling back",
        );
        await this.notifyDeleted(host, notified);
        return { result: "failed", reason: `${module.name}: ${errorMessage(error)}` };
      }
    }

    const next = new Map(this.hosts);
    next.set(name, host);
    this.publish(next);
    this.logger.info({ vhost: name, origin, hostNames }, "virtual host created");
    return { result: "succeeded", host };
  }

  private async applyDelete(name: string): Promise<ReconfigurationOutcome> {
    const host = this.hosts.get(name);
    if (!host) {
      return this.refuse("delete", name, "not_found", `Virtual host ${name} does not exist`);
    }
    if (host.isReadOnly) {
      return {
        ...this.refuse("delete", name, "failed", `Virtual host ${name} is read-only`),
        host,
      };
    }

    for (const module of [...this.modules].reverse()) {
      if (!module.onVirtualHostDeleting) {
        continue;
      }
      try {
        await module.onVirtualHostDeleting(host);
      } catch (error) {
        this.logger.warn(
          { vhost: name, module: module.name, err: normalizeError(error) },
          "module vetoed virtual host deletion",
        );
        return { result: "failed", reason: `${module.name}: ${errorMessage(error)}`, host };
      }
    }

    const next = new Map(this.hosts);
    next.delete(name);
    this.publish(next);
    await this.notifyDeleted(host, this.modules);
    this.logger.info({ vhost: name }, "virtual host deleted");
    return { result: "succeeded", host };
  }

  /** Deletion hooks in reverse order; failures are logged since the change is committed. */
  private async notifyDeleted(host: VirtualHost, modules: readonly OrchestratorModule[]): Promise<void> {
    for (const module of [...modules].reverse()) {
      try {
        await module.onVirtualHostDeleted(host);
      } catch (error) {
        this.logger.error(
          { vhost: host.name, module: module.name, err: normalizeError(error) },
          "module failed to release virtual host",
        );
      }
    }
  }

  private refuse(
    operation: ReconfigurationOperation,
    name: string,
    result: Exclude<ReconfigurationResult, "succeeded">,
    reason: string,
  ): ReconfigurationOutcome {
    this.logger.debug({ operation, vhost: name, result }, reason);
    return { result, reason };
  }

  private publish(next: ReadonlyMap<string, VirtualHost>): void {
    this.hosts = next;
    const counts: Record<VirtualHostOrigin, number> = { document: 0, api: 0 };
    for (const host of next.values()) {
      counts[host.origin] += 1;
    }
    for (const [origin, count] of Object.entries(counts)) {
      virtualHostGauge.labels(origin).set(count);
    }
  }
}
