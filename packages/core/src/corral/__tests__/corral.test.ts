import { describe, it, expect, vi, beforeEach } from "vitest";
import type { CliPlugin } from "@corral/sdk";
import { RegistrationError, RenderError, alert, exitStatus, table, text } from "@corral/sdk";
import type { ProcessIO } from "../../output/process-io.js";
import { createCorral, type Corral } from "../corral.js";

describe("Corral", () => {
  let out: { stdout: string; stderr: string };
  let io: ProcessIO;
  let corral: Corral;

  beforeEach(() => {
    out = { stdout: "", stderr: "" };
    io = {
      writeStdout: (chunk) => {
        out.stdout += chunk;
      },
      writeStderr: (chunk) => {
        out.stderr += chunk;
      },
    };
    corral = createCorral({ localNode: "n1", io, configCommands: false });
  });

  describe("invocation", () => {
    it("runs a bare-status command with exit code 0 and human output", async () => {
      corral.registerCommand(["admin", "status"], [], [], () => [text("running")]);

      await expect(corral.run(["admin", "status"])).resolves.toBe(0);
      expect(out).toEqual({ stdout: "running\n", stderr: "" });
    });

    it("surfaces the exit code of a tagged status", async () => {
      corral.registerCommand(["admin", "stop"], [], [], () => exitStatus(17, [text("stopping")], "human"));

      await expect(corral.run(["admin", "stop"])).resolves.toBe(17);
      expect(out.stdout).toBe("stopping\n");
    });

    it("reports an unknown command with exit code 1 without running anything", async () => {
      const handler = vi.fn(() => [text("running")]);
      corral.registerCommand(["admin", "status"], [], [], handler);

      await expect(corral.run(["admin", "nope"])).resolves.toBe(1);
      expect(handler).not.toHaveBeenCalled();
      expect(out).toEqual({ stdout: "", stderr: "Unknown command: admin nope\n" });
    });

    it("selects an exact path over an overlapping wildcard", async () => {
      const exact = vi.fn(() => [text("exact")]);
      const wild = vi.fn(() => [text("wild")]);
      corral.registerCommand(["admin", "status"], [], [], exact);
      corral.registerCommand(["admin", "*"], [], [], wild);

      await corral.run(["admin", "status"]);
      expect(exact).toHaveBeenCalledTimes(1);
      expect(wild).not.toHaveBeenCalled();
    });

    it("hands wildcard-resolved paths to the handler", async () => {
      const handler = vi.fn(() => [text("joined")]);
      corral.registerCommand(["cluster", "join", "*"], [], [], handler);

      await corral.run(["cluster", "join", "n2"]);
      expect(handler).toHaveBeenCalledWith(["cluster", "join", "n2"], {}, {}, expect.anything());
    });

    it("uses only the newest handler after re-registration", async () => {
      const before = vi.fn(() => [text("old")]);
      const after = vi.fn(() => [text("new")]);
      corral.registerCommand(["admin", "status"], [], [], before);
      corral.registerCommand(["admin", "status"], [], [], after);

      await corral.run(["admin", "status"]);
      expect(before).not.toHaveBeenCalled();
      expect(out.stdout).toBe("new\n");
    });

    it("stops routing to an unregistered command", async () => {
      corral.registerCommand(["admin", "status"], [], [], () => [text("running")]);
      expect(corral.unregisterCommand(["admin", "status"])).toBe(true);

      await expect(corral.run(["admin", "status"])).resolves.toBe(1);
    });
  });

  describe("validation", () => {
    it("passes integer flags through unchanged", async () => {
      const handler = vi.fn(() => [text("scaled")]);
      corral.registerCommand(["admin", "scale"], [], [{ name: "count", datatype: "integer" }], handler);

      await expect(corral.run(["admin", "scale", "--count", "12"])).resolves.toBe(0);
      expect(handler).toHaveBeenCalledWith(["admin", "scale"], {}, { count: 12 }, expect.anything());
    });

    it("rejects a non-integer value naming the flag, before the handler runs", async () => {
      const handler = vi.fn(() => [text("scaled")]);
      corral.registerCommand(["admin", "scale"], [], [{ name: "count", datatype: "integer" }], handler);

      await expect(corral.run(["admin", "scale", "--count", "abc"])).resolves.toBe(1);
      expect(handler).not.toHaveBeenCalled();
      expect(out.stderr).toBe('Invalid value for flag --count: "abc" (expected integer)\n');
    });

    it("appends usage to validation errors", async () => {
      corral.registerCommand(["admin", "join"], [{ name: "node" }], [], () => [text("joined")]);
      corral.registerUsage(["admin", "join"], "Usage: admin join <node>");

      await expect(corral.run(["admin", "join"])).resolves.toBe(1);
      expect(out.stderr).toBe("Missing required key: node\nUsage: admin join <node>\n");
    });

    it("rejects excess arguments", async () => {
      corral.registerCommand(["admin", "status"], [], [], () => [text("running")]);

      await expect(corral.run(["admin", "status", "extra"])).resolves.toBe(1);
      expect(out.stderr).toBe("Unexpected argument: extra\n");
    });
  });

  describe("global flags", () => {
    it("are accepted by commands that do not declare them", async () => {
      const handler = vi.fn(() => [text("running")]);
      corral.registerCommand(["admin", "status"], [], [], handler);

      await expect(corral.run(["admin", "status", "--all", "--format", "human"])).resolves.toBe(0);
      expect(handler).toHaveBeenCalledWith(["admin", "status"], {}, {}, expect.anything());
    });

    it("expose --all to the handler", async () => {
      let all = false;
      corral.registerCommand(["admin", "status"], [], [], (_path, _keys, _flags, ctx) => {
        all = ctx.globals.all;
        return [];
      });

      await corral.run(["admin", "status", "--all"]);
      expect(all).toBe(true);
    });

    it("select the writer with --format", async () => {
      corral.registerCommand(["admin", "status"], [], [], () => [text("running")]);

      await expect(corral.run(["admin", "status", "--format", "json"])).resolves.toBe(0);
      expect(out.stdout).toBe('[{"type":"text","text":"running"}]\n');
    });

    it("reject an unknown --format before anything runs", async () => {
      const handler = vi.fn(() => [text("running")]);
      corral.registerCommand(["admin", "status"], [], [], handler);

      await expect(corral.run(["admin", "status", "--format=yaml"])).rejects.toBeInstanceOf(RenderError);
      expect(handler).not.toHaveBeenCalled();
    });

    it("print usage instead of executing with --help", async () => {
      const handler = vi.fn(() => [text("running")]);
      corral.registerCommand(["admin", "status"], [], [], handler);
      corral.registerUsage(["admin"], "Usage: admin <command>");

      await expect(corral.run(["admin", "status", "--help"])).resolves.toBe(0);
      expect(handler).not.toHaveBeenCalled();
      expect(out.stdout).toBe("Usage: admin <command>\n");
    });

    it("print usage for an unknown path with -h", async () => {
      corral.registerUsage(["admin"], "Usage: admin <command>");

      await expect(corral.run(["admin", "nope", "-h"])).resolves.toBe(0);
      expect(out.stdout).toBe("Usage: admin <command>\n");
    });
  });

  describe("errors", () => {
    it("render human with exit code 1 even when json was requested", async () => {
      corral.registerCommand(["admin", "crash"], [], [], () => {
        throw new Error("boom");
      });

      await expect(corral.run(["admin", "crash", "--format", "json"])).resolves.toBe(1);
      expect(out).toEqual({ stdout: "", stderr: "boom\n" });
    });

    it("keep alerts of a successful status on stderr", async () => {
      corral.registerCommand(["admin", "status"], [], [], () => [
        table([{ node: "n1", state: "up" }]),
        alert([text("n2 is down")]),
      ]);

      await expect(corral.run(["admin", "status"])).resolves.toBe(0);
      expect(out.stdout).toBe("node  state\n-----------\nn1    up\n");
      expect(out.stderr).toBe("n2 is down\n");
    });
  });

  describe("print", () => {
    it("prints a usage fallback when none is registered", async () => {
      await expect(corral.print("usage", ["admin"])).resolves.toBe(1);
      expect(out.stderr).toBe("No usage available for: admin\n");
    });

    it("prints a status in the given format", async () => {
      await expect(corral.print([text("hi")], ["admin"], "json")).resolves.toBe(0);
      expect(out.stdout).toBe('[{"type":"text","text":"hi"}]\n');
    });
  });

  describe("plugins", () => {
    it("register commands through use()", async () => {
      const plugin: CliPlugin = {
        name: "status",
        register(api) {
          api.registerCommand(["admin", "status"], [], [], () => [text("from plugin")]);
        },
      };

      await corral.use(plugin);
      await corral.run(["admin", "status"]);
      expect(out.stdout).toBe("from plugin\n");
    });

    it("wraps a failing plugin in RegistrationError", async () => {
      const plugin: CliPlugin = {
        name: "broken",
        register() {
          throw new Error("boom");
        },
      };

      await expect(corral.use([plugin])).rejects.toThrow(RegistrationError);
      await expect(corral.use([plugin])).rejects.toThrow("Invalid plugin registration: broken: boom");
    });

    it("disposes plugins", async () => {
      const dispose = vi.fn();
      await corral.use({ name: "p", register: vi.fn(), dispose });
      await corral.dispose();
      expect(dispose).toHaveBeenCalledTimes(1);
    });
  });

  describe("nodes", () => {
    it("come from the registered node finder", async () => {
      await expect(corral.nodes()).resolves.toEqual(["n1"]);
      corral.registerNodeFinder(() => ["n1", "n2"]);
      await expect(corral.nodes()).resolves.toEqual(["n1", "n2"]);
    });
  });
});
