import { EventEmitter } from "events";
import net from "net";

import type { ListenerConfig } from "./config";
import { ListenerBindError, getErrorCode } from "./errors";

export type ListenerState = "starting" | "running" | "stopped";

export type ListenerAddress = {
  host: string;
  port: number;
};

export type ListenerStatus = {
  name: string;
  protocol: ListenerConfig["protocol"];
  state: ListenerState;
  enabled: boolean;
  /** bound address while running */
  address: ListenerAddress | null;
};

export type ConnectionHandler = (socket: net.Socket, listener: Listener) => void;

/**
 * One bound TCP port serving a single protocol.
 *
 * Emits `state` on every transition. Stopping only stops accepting; sessions
 * already dispatched keep running.
 */
export class Listener extends EventEmitter {
  private server: net.Server | null = null;
  private state: ListenerState = "stopped";
  private startPromise: Promise<ListenerAddress> | null = null;

  constructor(
    readonly config: ListenerConfig,
    private readonly onConnection: ConnectionHandler
  ) {
    super();
  }

  get name() {
    return this.config.name;
  }

  address(): ListenerAddress | null {
    const address = this.server?.address();
    if (!address || typeof address === "string") return null;
    return { host: address.address, port: address.port };
  }

  status(): ListenerStatus {
    return {
      name: this.config.name,
      protocol: this.config.protocol,
      state: this.state,
      enabled: this.config.enabled,
      address: this.state === "running" ? this.address() : null,
    };
  }

  /**
   * Bind and start accepting.
   *
   * @throws ListenerBindError when the port cannot be bound
   */
  async start(): Promise<ListenerAddress> {
    if (this.startPromise) return this.startPromise;
    const running = this.state === "running" ? this.address() : null;
    if (running) return running;

    this.startPromise = this.bind().finally(() => {
      this.startPromise = null;
    });
    return this.startPromise;
  }

  async stop(): Promise<void> {
    if (this.startPromise) {
      try {
        await this.startPromise;
      } catch {
        // bind failed; nothing to close
        return;
      }
    }
    const server = this.server;
    if (!server) return;
    this.server = null;
    server.close();
    this.setState("stopped");
  }

  private bind(): Promise<ListenerAddress> {
    this.setState("starting");
    const { host, port, name } = this.config;
    const server = net.createServer({ pauseOnConnect: true }, (socket) => {
      this.onConnection(socket, this);
    });

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        server.off("listening", onListening);
        this.setState("stopped");
        reject(new ListenerBindError(name, host, port, getErrorCode(err) ?? "EUNKNOWN"));
      };
      const onListening = () => {
        server.off("error", onError);
        server.on("error", (err) => this.emit("error", err));
        this.server = server;
        this.setState("running");
        const bound = this.address();
        resolve(bound ?? { host, port });
      };
      server.once("error", onError);
      server.once("listening", onListening);
      server.listen(port, host);
    });
  }

  private setState(state: ListenerState) {
    if (this.state === state) return;
    this.state = state;
    this.emit("state", state);
  }
}
