import {
  AlwaysConnected,
  CommandConnectivity,
  type CommandResult,
} from "../connectivity.js";
import { recordSleeps } from "./util.js";

function scriptedRunner(results: Record<string, Array<CommandResult | Error>>) {
  const calls: string[] = [];
  const runner = async (argv: readonly string[]): Promise<CommandResult> => {
    const name = argv[0];
    calls.push(name);
    const next = results[name]?.shift();
    if (next instanceof Error) throw next;
    return next ?? { code: 1, stdout: "", stderr: "no script" };
  };
  return { calls, runner };
}

const up: CommandResult = { code: 0, stdout: "Connected", stderr: "" };
const down: CommandResult = { code: 1, stdout: "Disconnected", stderr: "" };

describe("CommandConnectivity", () => {
  const base = {
    checkCommand: ["vpn-check"],
    connectCommand: ["vpn-connect"],
    retries: 3,
    retryDelayMs: 5000,
    timeoutMs: 1000,
  };

  test("already connected runs only the check", async () => {
    const { calls, runner } = scriptedRunner({ "vpn-check": [up] });
    const c = new CommandConnectivity({ ...base, runner });
    expect(await c.ensureConnected()).toBe(true);
    expect(calls).toEqual(["vpn-check"]);
  });

  test("connects and re-checks", async () => {
    const { calls, runner } = scriptedRunner({
      "vpn-check": [down, up],
      "vpn-connect": [up],
    });
    const c = new CommandConnectivity({ ...base, runner });
    expect(await c.ensureConnected()).toBe(true);
    expect(calls).toEqual(["vpn-check", "vpn-connect", "vpn-check"]);
  });

  test("gives up after the configured attempts with a fixed delay", async () => {
    const sleeps = recordSleeps();
    const { calls, runner } = scriptedRunner({
      "vpn-check": [down],
      "vpn-connect": [down, new Error("spawn vpn-connect ENOENT")],
    });
    const c = new CommandConnectivity({
      ...base,
      retries: 2,
      runner,
      sleep: sleeps.sleep,
    });
    expect(await c.ensureConnected()).toBe(false);
    expect(calls).toEqual(["vpn-check", "vpn-connect", "vpn-connect"]);
    expect([...sleeps]).toEqual([5000]);
  });

  test("without a connect command a failed check is final", async () => {
    const { calls, runner } = scriptedRunner({ "vpn-check": [down] });
    const c = new CommandConnectivity({ ...base, connectCommand: null, runner });
    expect(await c.ensureConnected()).toBe(false);
    expect(calls).toEqual(["vpn-check"]);
  });

  test("no check command means nothing to verify", async () => {
    const { calls, runner } = scriptedRunner({});
    const c = new CommandConnectivity({ ...base, checkCommand: null, runner });
    expect(await c.ensureConnected()).toBe(true);
    expect(calls).toEqual([]);
    expect(await new AlwaysConnected().ensureConnected()).toBe(true);
  });
});
