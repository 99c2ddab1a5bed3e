import { describe, it, expect, beforeEach } from "vitest";
import { createMemoryConfigStore } from "../../infrastructure/config-registry.js";
import { createCorral, type Corral } from "../../corral/corral.js";
import type { ProcessIO } from "../../output/process-io.js";
import { createLoopbackNetwork } from "../../transport/loopback.js";
import { createRpcHandler } from "../../transport/node-server.js";

interface Captured {
  io: ProcessIO;
  out: { stdout: string; stderr: string };
}

function capture(): Captured {
  const out = { stdout: "", stderr: "" };
  return {
    out,
    io: {
      writeStdout: (chunk) => {
        out.stdout += chunk;
      },
      writeStderr: (chunk) => {
        out.stderr += chunk;
      },
    },
  };
}

describe("config commands on one node", () => {
  let corral: Corral;
  let out: Captured["out"];

  beforeEach(() => {
    const captured = capture();
    out = captured.out;
    corral = createCorral({
      localNode: "n1",
      io: captured.io,
      script: "admin",
      configStore: createMemoryConfigStore({ "log.level": "info", "max.conn": "10" }),
    });
  });

  it("shows values as a table", async () => {
    await expect(corral.run(["admin", "show", "log.level"])).resolves.toBe(0);
    expect(out.stdout).toBe("node  log.level\n---------------\nn1    info\n");
  });

  it("applies registered formatters", async () => {
    corral.registerFormatter("max.conn", (value) => `${value}/s`);
    await corral.run(["admin", "show", "max.conn", "--format", "json"]);
    expect(out.stdout).toBe('[{"type":"table","rows":[{"node":"n1","max.conn":"10/s"}]}]\n');
  });

  it("reports unknown keys", async () => {
    await expect(corral.run(["admin", "show", "nope"])).resolves.toBe(1);
    expect(out.stderr).toBe("Unknown config key: nope\n");
  });

  it("needs at least one key", async () => {
    await expect(corral.run(["admin", "show"])).resolves.toBe(1);
    expect(out.stderr).toBe("show needs at least one config key\nUsage: admin show <key>... [--all]\n");
  });

  it("refuses keys that are not whitelisted", async () => {
    await expect(corral.run(["admin", "set", "log.level=debug"])).resolves.toBe(1);
    expect(out.stderr).toBe("Config key not settable: log.level\n");
    expect(corral.config.store.get("log.level")).toBe("info");
  });

  it("sets whitelisted keys and reports callback messages", async () => {
    expect(corral.registerConfigWhitelist(["log.level"], "app")).toEqual({ ok: true });
    corral.registerConfig("log.level", (_key, value, flags) => `log level is now ${value}${flags.quiet ? " (quiet)" : ""}`);

    await expect(corral.run(["admin", "set", "log.level=debug", "--quiet"])).resolves.toBe(0);
    expect(out.stdout).toBe("log level is now debug (quiet)\n");
    expect(corral.config.store.get("log.level")).toBe("debug");
  });

  it("rejects __proto__ as an unknown key instead of dropping it", async () => {
    corral.registerConfigWhitelist(["log.level"], "app");
    await expect(corral.run(["admin", "set", "__proto__=x", "log.level=debug"])).resolves.toBe(1);
    expect(out.stderr).toBe("Unknown config key: __proto__\n");
    expect(corral.config.store.get("log.level")).toBe("info");
  });

  it("rejects set arguments that are not assignments", async () => {
    corral.registerConfigWhitelist(["log.level"], "app");
    await expect(corral.run(["admin", "set", "log.level"])).resolves.toBe(1);
    expect(out.stderr).toBe("Expected key=value, got: log.level\nUsage: admin set <key>=<value>... [--all]\n");
  });

  it("rejects a whitelist naming unknown keys", () => {
    expect(corral.registerConfigWhitelist(["log.level", "nope"], "app")).toEqual({
      ok: false,
      error: "invalid_config_keys",
      keys: ["nope"],
    });
  });

  it("describes keys", async () => {
    corral.registerConfigWhitelist(["log.level"], "app");
    await expect(corral.run(["admin", "describe", "log.level"])).resolves.toBe(0);
    expect(out.stdout).toBe(
      "key        value  settable  apps\n" +
        "--------------------------------\n" +
        "log.level  info   true      app\n",
    );
  });
});

describe("config commands across nodes", () => {
  let n1: Corral;
  let n2: Corral;
  let out1: Captured["out"];

  beforeEach(() => {
    const network = createLoopbackNetwork();
    const c1 = capture();
    const c2 = capture();
    out1 = c1.out;

    const t1 = network.join("n1", c1.io);
    const t2 = network.join("n2", c2.io);
    n1 = createCorral({
      transport: t1,
      io: c1.io,
      script: "admin",
      configStore: createMemoryConfigStore({ "log.level": "info" }),
    });
    n2 = createCorral({
      transport: t2,
      io: c2.io,
      script: "admin",
      configStore: createMemoryConfigStore({ "log.level": "warn" }),
    });
    t1.serve(createRpcHandler({ target: n1, io: c1.io }));
    t2.serve(createRpcHandler({ target: n2, io: c2.io }));
  });

  it("shows every node with --all", async () => {
    n1.registerNodeFinder(() => ["n1", "n2"]);

    await expect(n1.run(["admin", "show", "log.level", "--all"])).resolves.toBe(0);
    expect(out1.stdout).toBe("node  log.level\n---------------\nn1    info\nn2    warn\n");
  });

  it("lists unreachable nodes and exits 1", async () => {
    n1.registerNodeFinder(() => ["n1", "n3"]);

    await expect(n1.run(["admin", "show", "log.level", "--all"])).resolves.toBe(1);
    expect(out1.stdout).toBe("node  log.level\n---------------\nn1    info\n");
    expect(out1.stderr).toBe(
      'admin show failed on 1 node(s)\nFailed nodes:\n  n3: Transport to node "n3" failed: node is not reachable\n',
    );
  });

  it("reports a partial failure of set --all as JSON", async () => {
    n1.registerNodeFinder(() => ["n1", "n3"]);
    n1.registerConfigWhitelist(["log.level"], "app");

    await expect(n1.run(["admin", "set", "log.level=error", "--all", "--format", "json"])).resolves.toBe(1);
    expect(n1.config.store.get("log.level")).toBe("error");
    expect(out1.stderr).toBe(
      JSON.stringify({
        alert: [
          { type: "text", text: "admin set failed on 1 node(s)" },
          {
            type: "list",
            title: "Failed nodes",
            values: ['n3: Transport to node "n3" failed: node is not reachable'],
          },
        ],
      }) + "\n",
    );
  });

  it("sets on every node with --all", async () => {
    n1.registerNodeFinder(() => ["n1", "n2"]);
    n1.registerConfigWhitelist(["log.level"], "app");
    n2.registerConfigWhitelist(["log.level"], "app");
    n2.registerConfig("log.level", (_key, value) => `now ${value}`);

    await expect(n1.run(["admin", "set", "log.level=error", "--all"])).resolves.toBe(0);
    expect(out1.stdout).toBe("n2: now error\n");
    expect(n1.config.store.get("log.level")).toBe("error");
    expect(n2.config.store.get("log.level")).toBe("error");
  });
});
