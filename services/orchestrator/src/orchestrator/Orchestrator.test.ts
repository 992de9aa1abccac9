import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  reconfigurationCounter,
  resetMetrics,
  virtualHostGauge,
} from "../observability/metrics.js";
import { HostConfig } from "../schemas/HostConfig.js";
import { VirtualHostConfig } from "../schemas/VirtualHostConfig.js";
import { silentLogger } from "../test/utils.js";
import { FrozenMutationError } from "../values/Value.js";
import { Orchestrator, type OrchestratorModule, type VirtualHost } from "./Orchestrator.js";

const CREATED_AT = new Date("2024-05-01T12:00:00.000Z");

function definition(name: string, hostNames: string[] = []): VirtualHostConfig {
  const vhost = new VirtualHostConfig();
  vhost.name.assign(name);
  if (hostNames.length > 0) {
    const host = new HostConfig();
    for (const hostName of hostNames) {
      host.names.add().assign(hostName);
    }
    vhost.host.assign(host);
  }
  return vhost;
}

function createOrchestrator(): Orchestrator {
  return new Orchestrator({ logger: silentLogger, now: () => CREATED_AT });
}

type RecordingModule = OrchestratorModule & { events: string[] };

function recordingModule(name: string, events: string[] = []): RecordingModule {
  return {
    name,
    events,
    onVirtualHostCreated: vi.fn((host: VirtualHost) => {
      events.push(`${name}:created:${host.name}`);
    }),
    onVirtualHostDeleting: vi.fn((host: VirtualHost) => {
      events.push(`${name}:deleting:${host.name}`);
    }),
    onVirtualHostDeleted: vi.fn((host: VirtualHost) => {
      events.push(`${name}:deleted:${host.name}`);
    }),
  };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("Orchestrator.createVirtualHost", () => {
  beforeEach(() => {
    resetMetrics();
  });

  it("publishes a frozen copy of the definition", async () => {
    const orchestrator = createOrchestrator();
    const input = definition("live", ["Live.Example.com"]);

    const outcome = await orchestrator.createVirtualHost(input);

    expect(outcome.result).toBe("succeeded");
    expect(outcome.host).toMatchObject({
      name: "live",
      origin: "api",
      isReadOnly: false,
      hostNames: ["live.example.com"],
      createdAt: CREATED_AT,
    });
    expect(orchestrator.getVirtualHost("live")).toBe(outcome.host);
    expect(outcome.host?.config.isReadOnly()).toBe(true);
    expect(input.isReadOnly()).toBe(false);

    input.name.assign("changed");
    expect(outcome.host?.config.name.value).toBe("live");
  });

  it("refuses a frozen definition before queueing anything", () => {
    const orchestrator = createOrchestrator();
    const input = definition("live").freeze();

    expect(() => orchestrator.createVirtualHost(input)).toThrow(FrozenMutationError);
    expect(orchestrator.snapshot().size).toBe(0);
  });

  it("trims the host name", async () => {
    const orchestrator = createOrchestrator();

    const outcome = await orchestrator.createVirtualHost(definition("  live  "));

    expect(outcome.host?.name).toBe("live");
    expect(orchestrator.getVirtualHost("live")).toBeDefined();
  });

  it("fails for a blank name", async () => {
    const orchestrator = createOrchestrator();

    await expect(orchestrator.createVirtualHost(definition("   "))).resolves.toEqual({
      result: "failed",
      reason: "Virtual host name is required",
    });
    expect(orchestrator.snapshot().size).toBe(0);
  });

  it("reports an existing name without replacing the host", async () => {
    const orchestrator = createOrchestrator();
    const first = await orchestrator.createVirtualHost(definition("live"));

    const second = await orchestrator.createVirtualHost(definition("live", ["other.example.com"]));

    expect(second).toEqual({ result: "already_exists", reason: "Virtual host live already exists" });
    expect(orchestrator.getVirtualHost("live")).toBe(first.host);
  });

  it("fails when a host name belongs to another virtual host", async () => {
    const orchestrator = createOrchestrator();
    await orchestrator.createVirtualHost(definition("one", ["a.example.com"]));

    const outcome = await orchestrator.createVirtualHost(definition("two", ["b.example.com", "A.EXAMPLE.COM"]));

    expect(outcome).toEqual({
      result: "failed",
      reason: "Host name a.example.com is already used by virtual host one",
    });
    expect(orchestrator.getVirtualHost("two")).toBeUndefined();
  });

  it("marks document hosts read-only unless told otherwise", async () => {
    const orchestrator = createOrchestrator();

    const fromDocument = await orchestrator.createVirtualHost(definition("doc"), { origin: "document" });
    const writable = await orchestrator.createVirtualHost(definition("doc-writable"), {
      origin: "document",
      readOnly: false,
    });

    expect(fromDocument.host?.isReadOnly).toBe(true);
    expect(writable.host?.isReadOnly).toBe(false);
  });

  it("notifies modules in registration order", async () => {
    const orchestrator = createOrchestrator();
    const events: string[] = [];
    orchestrator.registerModule(recordingModule("first", events));
    orchestrator.registerModule(recordingModule("second", events));

    await orchestrator.createVirtualHost(definition("live"));

    expect(events).toEqual(["first:created:live", "second:created:live"]);
  });

  it("rolls back notified modules when one rejects the host", async () => {
    const orchestrator = createOrchestrator();
    const events: string[] = [];
    const first = recordingModule("first", events);
    const second = recordingModule("second", events);
    const third = recordingModule("third", events);
    third.onVirtualHostCreated = vi.fn(() => {
      throw new Error("no capacity");
    });
    orchestrator.registerModule(first);
    orchestrator.registerModule(second);
    orchestrator.registerModule(third);

    const outcome = await orchestrator.createVirtualHost(definition("live"));

    expect(outcome).toEqual({ result: "failed", reason: "third: no capacity" });
    expect(events).toEqual([
      "first:created:live",
      "second:created:live",
      "second:deleted:live",
      "first:deleted:live",
    ]);
    expect(third.onVirtualHostDeleted).not.toHaveBeenCalled();
    expect(orchestrator.getVirtualHost("live")).toBeUndefined();
  });

  it("records the result of each reconfiguration", async () => {
    const orchestrator = createOrchestrator();
    await orchestrator.createVirtualHost(definition("live"));
    await orchestrator.createVirtualHost(definition("live"));

    const counter = await reconfigurationCounter.get();
    const gauge = await virtualHostGauge.get();

    expect(counter.values).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ labels: { operation: "create", result: "succeeded" }, value: 1 }),
        expect.objectContaining({ labels: { operation: "create", result: "already_exists" }, value: 1 }),
      ]),
    );
    expect(gauge.values).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ labels: { origin: "api" }, value: 1 }),
        expect.objectContaining({ labels: { origin: "document" }, value: 0 }),
      ]),
    );
  });
});

describe("Orchestrator.deleteVirtualHost", () => {
  it("reports an unknown host", async () => {
    const orchestrator = createOrchestrator();

    await expect(orchestrator.deleteVirtualHost("missing")).resolves.toEqual({
      result: "not_found",
      reason: "Virtual host missing does not exist",
    });
  });

  it("removes the host and notifies modules in reverse order", async () => {
    const orchestrator = createOrchestrator();
    const events: string[] = [];
    orchestrator.registerModule(recordingModule("first", events));
    orchestrator.registerModule(recordingModule("second", events));
    const created = await orchestrator.createVirtualHost(definition("live", ["a.example.com"]));
    events.length = 0;

    const outcome = await orchestrator.deleteVirtualHost("live");

    expect(outcome).toEqual({ result: "succeeded", host: created.host });
    expect(events).toEqual([
      "second:deleting:live",
      "first:deleting:live",
      "second:deleted:live",
      "first:deleted:live",
    ]);
    expect(orchestrator.getVirtualHost("live")).toBeUndefined();
    expect(orchestrator.findByHostName("a.example.com")).toBeUndefined();
  });

  it("refuses to delete a read-only host", async () => {
    const orchestrator = createOrchestrator();
    const created = await orchestrator.createVirtualHost(definition("doc"), { origin: "document" });

    const outcome = await orchestrator.deleteVirtualHost("doc");

    expect(outcome).toEqual({
      result: "failed",
      reason: "Virtual host doc is read-only",
      host: created.host,
    });
    expect(orchestrator.getVirtualHost("doc")).toBe(created.host);
  });

  it("keeps the host when a module vetoes the deletion", async () => {
    const orchestrator = createOrchestrator();
    const events: string[] = [];
    const guard = recordingModule("sessions", events);
    guard.onVirtualHostDeleting = vi.fn(() => {
      throw new Error("2 active session(s)");
    });
    orchestrator.registerModule(guard);
    await orchestrator.createVirtualHost(definition("live"));

    const outcome = await orchestrator.deleteVirtualHost("live");

    expect(outcome.result).toBe("failed");
    expect(outcome.reason).toBe("sessions: 2 active session(s)");
    expect(guard.onVirtualHostDeleted).not.toHaveBeenCalled();
    expect(orchestrator.getVirtualHost("live")).toBeDefined();
  });

  it("completes the deletion when a module fails to release the host", async () => {
    const orchestrator = createOrchestrator();
    const leaky = recordingModule("leaky");
    leaky.onVirtualHostDeleted = vi.fn(() => {
      throw new Error("release failed");
    });
    orchestrator.registerModule(leaky);
    await orchestrator.createVirtualHost(definition("live"));

    const outcome = await orchestrator.deleteVirtualHost("live");

    expect(outcome.result).toBe("succeeded");
    expect(orchestrator.getVirtualHost("live")).toBeUndefined();
  });
});

describe("Orchestrator concurrency", () => {
  it("leaves snapshots held by readers unchanged", async () => {
    const orchestrator = createOrchestrator();
    await orchestrator.createVirtualHost(definition("one"));
    const before = orchestrator.snapshot();

    await orchestrator.createVirtualHost(definition("two"));
    await orchestrator.deleteVirtualHost("one");

    expect([...before.keys()]).toEqual(["one"]);
    expect([...orchestrator.snapshot().keys()]).toEqual(["two"]);
  });

  it("applies writers one at a time in call order", async () => {
    const orchestrator = createOrchestrator();
    const gate = deferred();
    const events: string[] = [];
    orchestrator.registerModule({
      name: "slow",
      async onVirtualHostCreated(host) {
        events.push(`start:${host.name}`);
        if (host.name === "one") {
          await gate.promise;
        }
        events.push(`end:${host.name}`);
      },
      onVirtualHostDeleted: () => undefined,
    });

    const first = orchestrator.createVirtualHost(definition("one"));
    const second = orchestrator.createVirtualHost(definition("two"));
    const duplicate = orchestrator.createVirtualHost(definition("one"));
    await Promise.resolve();
    expect(orchestrator.snapshot().size).toBe(0);

    gate.resolve();
    const outcomes = await Promise.all([first, second, duplicate]);

    expect(outcomes.map((outcome) => outcome.result)).toEqual(["succeeded", "succeeded", "already_exists"]);
    expect(events).toEqual(["start:one", "end:one", "start:two", "end:two"]);
  });

  it("reports a failure while building the host and keeps accepting writes", async () => {
    let calls = 0;
    const orchestrator = new Orchestrator({
      logger: silentLogger,
      now: () => {
        calls += 1;
        if (calls === 1) {
          throw new Error("clock unavailable");
        }
        return CREATED_AT;
      },
    });

    const failed = await orchestrator.createVirtualHost(definition("one"));

    expect(failed).toEqual({ result: "failed", reason: "clock unavailable" });
    expect(orchestrator.snapshot().size).toBe(0);
    await expect(orchestrator.createVirtualHost(definition("one"))).resolves.toMatchObject({
      result: "succeeded",
    });
  });

  it("gives concurrent readers only complete published hosts while a writer churns", async () => {
    const orchestrator = createOrchestrator();
    const accepted = new Set<string>();
    const released = new Set<string>();
    const yieldTurn = () => new Promise<void>((resolve) => setImmediate(resolve));
    orchestrator.registerModule({
      name: "slow",
      async onVirtualHostCreated(host) {
        await yieldTurn();
        await yieldTurn();
        accepted.add(host.name);
      },
      async onVirtualHostDeleting() {
        await yieldTurn();
      },
      onVirtualHostDeleted(host) {
        released.add(host.name);
      },
    });

    const rounds = 40;
    let writing = true;
    const violations: string[] = [];
    let observed = 0;

    // A snapshot held across an await may outlive the host; it must still be intact.
    const checkHost = (host: VirtualHost, current: boolean) => {
      observed += 1;
      const expectedNames = [`${host.name}.a.example.com`, `${host.name}.b.example.com`];
      if (!accepted.has(host.name) || (current && released.has(host.name))) {
        violations.push(`${host.name} visible outside its lifetime`);
      }
      if (!Object.isFrozen(host) || !host.config.isReadOnly()) {
        violations.push(`${host.name} is mutable`);
      }
      if (host.config.name.value !== host.name || host.hostNames.join() !== expectedNames.join()) {
        violations.push(`${host.name} is incomplete`);
      }
    };

    const reader = async () => {
      while (writing) {
        const snapshot = orchestrator.listVirtualHosts();
        for (const host of snapshot) {
          checkHost(host, true);
        }
        await yieldTurn();
        for (const host of snapshot) {
          checkHost(host, false);
          const current = orchestrator.getVirtualHost(host.name);
          if (current) {
            checkHost(current, true);
          }
        }
      }
    };

    const writer = async () => {
      try {
        for (let round = 0; round < rounds; round += 1) {
          const name = `vh${round}`;
          const created = await orchestrator.createVirtualHost(
            definition(name, [`${name}.a.example.com`, `${name}.b.example.com`]),
          );
          if (created.result !== "succeeded" || orchestrator.getVirtualHost(name) !== created.host) {
            violations.push(`${name} not published after creation`);
          }
          await yieldTurn();
          if (round % 2 === 0) {
            const deleted = await orchestrator.deleteVirtualHost(name);
            if (deleted.result !== "succeeded" || orchestrator.getVirtualHost(name) !== undefined) {
              violations.push(`${name} still published after deletion`);
            }
          }
        }
      } finally {
        writing = false;
      }
    };

    await Promise.all([writer(), ...Array.from({ length: 16 }, () => reader())]);

    expect(violations).toEqual([]);
    expect(observed).toBeGreaterThan(0);
    expect(orchestrator.listVirtualHosts()).toHaveLength(rounds / 2);
  });

  it("finds hosts by host name case-insensitively", async () => {
    const orchestrator = createOrchestrator();
    await orchestrator.createVirtualHost(definition("live", ["a.example.com"]));

    expect(orchestrator.findByHostName(" A.Example.COM ")?.name).toBe("live");
    expect(orchestrator.findByHostName("b.example.com")).toBeUndefined();
  });
});
