import net from "net";

import type { TargetAddress } from "./address";
import { UpstreamConnectError, getErrorCode, getErrorMessage } from "./errors";

export type ConnectUpstreamOptions = {
  /** connect deadline in `ms` */
  timeoutMs: number;
  /** aborts the attempt (shutdown) */
  signal?: AbortSignal;
  /** hostname resolver for domain targets */
  lookup?: net.LookupFunction;
  /** attached before the socket is handed out and kept for its lifetime */
  onError?: (err: Error) => void;
};

/**
 * Open a TCP connection to `target`.
 *
 * Rejects with UpstreamConnectError on refusal, resolution failure or
 * timeout; the code is `ETIMEDOUT` for the latter.
 */
export function connectUpstream(target: TargetAddress, options: ConnectUpstreamOptions): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new UpstreamConnectError("connect aborted", "ECONNABORTED"));
      return;
    }

    const socket = net.connect({ host: target.host, port: target.port, lookup: options.lookup });
    let settled = false;

    const cleanup = () => {
      clearTimeout(timer);
      socket.off("connect", onConnect);
      socket.off("error", onConnectError);
      options.signal?.removeEventListener("abort", onAbort);
    };

    const fail = (err: UpstreamConnectError) => {
      if (settled) return;
      settled = true;
      cleanup();
      socket.destroy();
      reject(err);
    };

    const onConnect = () => {
      if (settled) return;
      settled = true;
      cleanup();
      socket.setNoDelay(true);
      resolve(socket);
    };

    const onConnectError = (err: Error) => {
      fail(new UpstreamConnectError(getErrorMessage(err), getErrorCode(err) ?? "ECONNFAILED"));
    };

    const onAbort = () => {
      fail(new UpstreamConnectError("connect aborted", "ECONNABORTED"));
    };

    const timer = setTimeout(() => {
      fail(new UpstreamConnectError(`connect timed out after ${options.timeoutMs}ms`, "ETIMEDOUT"));
    }, options.timeoutMs);

    if (options.onError) socket.on("error", options.onError);
    socket.once("connect", onConnect);
    socket.on("error", onConnectError);
    options.signal?.addEventListener("abort", onAbort, { once: true });
  });
}
