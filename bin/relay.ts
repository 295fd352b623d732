#!/usr/bin/env node
import { ConfigError, ListenerBindError, getErrorMessage } from "../src/errors";
import { loadRelayConfig, type RelayConfig } from "../src/config";
import { ALL_DEBUG_FLAGS, type DebugFlag } from "../src/debug";
import { ManagementServer } from "../src/management-server";
import { RelayServer } from "../src/server";
import { formatDuration } from "../src/traffic";

type CommonArgs = {
  config?: string;
};

type ServeArgs = CommonArgs & {
  debug?: DebugFlag[] | true;
};

function usage() {
  console.log("Usage: relay <command> [options]");
  console.log("Commands:");
  console.log("  serve        Start the configured listeners");
  console.log("  check        Validate a configuration file");
  console.log("  help         Show this help");
  console.log("\nRun relay <command> --help for command-specific flags.");
}

function serveUsage() {
  console.log("Usage: relay serve --config PATH [options]");
  console.log("Options:");
  console.log("  --config PATH        Configuration file (JSON)");
  console.log(`  --debug FLAGS        Comma list of ${ALL_DEBUG_FLAGS.join(",")} or "all"`);
  console.log("\nRELAY_DEBUG is read when --debug is not given.");
}

function checkUsage() {
  console.log("Usage: relay check --config PATH");
}

function isDebugFlag(value: string): value is DebugFlag {
  return ALL_DEBUG_FLAGS.some((flag) => flag === value);
}

function parseArgs(argv: string[], showUsage: () => void): ServeArgs {
  const args: ServeArgs = {};

  const fail = (message: string): never => {
    console.error(message);
    showUsage();
    process.exit(1);
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--config":
      case "-c":
        args.config = argv[++i] ?? fail("--config requires a path");
        break;
      case "--debug": {
        const raw = argv[++i] ?? fail("--debug requires a value");
        if (raw === "all" || raw === "*") {
          args.debug = true;
          break;
        }
        const flags: DebugFlag[] = [];
        for (const entry of raw.split(",")) {
          const flag = entry.trim();
          if (!isDebugFlag(flag)) fail(`unknown debug flag: ${flag}`);
          else flags.push(flag);
        }
        args.debug = flags;
        break;
      }
      case "--help":
      case "-h":
        showUsage();
        process.exit(0);
      default:
        fail(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

function loadConfigOrExit(path: string | undefined, showUsage: () => void): RelayConfig {
  if (!path) {
    console.error("--config is required");
    showUsage();
    process.exit(1);
  }
  try {
    return loadRelayConfig(path);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error("configuration invalid:");
      for (const issue of err.issues) console.error(`  - ${issue}`);
    } else {
      console.error(`failed to read ${path}: ${getErrorMessage(err)}`);
    }
    process.exit(1);
  }
}

function formatLog(message: string) {
  if (message.endsWith("\n")) return message;
  return `${message}\n`;
}

export function runCheck(argv: string[]) {
  const args = parseArgs(argv, checkUsage);
  const config = loadConfigOrExit(args.config, checkUsage);
  console.log("configuration valid");
  for (const listener of config.listeners) {
    const state = listener.enabled ? "" : " (disabled)";
    console.log(`  ${listener.name}: ${listener.protocol} on ${listener.host}:${listener.port}${state}`);
  }
}

export async function runServe(argv: string[]) {
  const args = parseArgs(argv, serveUsage);
  const config = loadConfigOrExit(args.config, serveUsage);

  const relay = new RelayServer({
    listeners: config.listeners,
    policy: config.policy,
    debug: args.debug,
  });

  relay.on("log", (message: string) => {
    process.stdout.write(formatLog(message));
  });

  const addresses = await relay.start().catch((err: unknown) => {
    if (err instanceof ListenerBindError) {
      console.error(`failed to bind port ${err.port} (${err.listener}: ${err.code})`);
      process.exit(1);
    }
    throw err;
  });

  for (const [name, address] of Object.entries(addresses)) {
    console.log(`listener ${name} listening on ${address.host}:${address.port}`);
  }

  let management: ManagementServer | null = null;
  if (config.management) {
    management = new ManagementServer(relay, config.management);
    management.on("error", (err: Error) => {
      process.stdout.write(formatLog(`management error: ${err.message}`));
    });
    const address = await management.start();
    console.log(`management channel listening on ${address.url}`);
  }

  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    console.log(`shutting down after ${formatDuration(relay.snapshot().uptimeMs)}`);
    await relay.shutdown();
    await management?.stop();
    process.exit(0);
  };

  management?.on("shutdown", () => {
    void shutdown();
  });

  process.on("SIGINT", () => {
    void shutdown();
  });

  process.on("SIGTERM", () => {
    void shutdown();
  });
}

async function main() {
  const [command, ...args] = process.argv.slice(2);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    usage();
    process.exit(command ? 0 : 1);
  }

  switch (command) {
    case "serve":
      await runServe(args);
      return;
    case "check":
      runCheck(args);
      return;
    default:
      console.error(`Unknown command: ${command}`);
      usage();
      process.exit(1);
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error(getErrorMessage(err));
    process.exit(1);
  });
}
