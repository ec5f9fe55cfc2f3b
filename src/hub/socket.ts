/**
 * Hub Module - Transport
 *
 * Minimal socket surface the client needs, with the `ws` implementation
 * used in production. Tests substitute an in-process fake.
 */
import WebSocket from "ws";

export interface HubSocket {
  /** Resolves once the frame is written, rejects on write failure. */
  send(data: string): Promise<void>;
  close(): void;
  onMessage(handler: (data: string) => void): void;
  onClose(handler: (code: number, reason: string) => void): void;
  onError(handler: (error: Error) => void): void;
}

/**
 * Opens a socket; resolves when the transport is open.
 */
export type SocketFactory = (url: string) => Promise<HubSocket>;

function wrap(ws: WebSocket): HubSocket {
  return {
    send(data) {
      return new Promise<void>((resolve, reject) => {
        try {
          ws.send(data, (error) => (error ? reject(error) : resolve()));
        } catch (error) {
          reject(error instanceof Error ? error : new Error(String(error)));
        }
      });
    },
    close() {
      ws.close();
    },
    onMessage(handler) {
      ws.on("message", (data) =>
        handler(
          Array.isArray(data)
            ? Buffer.concat(data).toString()
            : data instanceof ArrayBuffer
              ? Buffer.from(data).toString()
              : data.toString(),
        ),
      );
    },
    onClose(handler) {
      ws.on("close", (code, reason) => handler(code, reason.toString()));
    },
    onError(handler) {
      ws.on("error", handler);
    },
  };
}

export const openWebSocket: SocketFactory = (url) =>
  new Promise<HubSocket>((resolve, reject) => {
    const ws = new WebSocket(url);

    const onOpenError = (error: Error) => {
      ws.removeListener("open", onOpen);
      reject(error);
    };
    const onOpen = () => {
      ws.removeListener("error", onOpenError);
      resolve(wrap(ws));
    };

    ws.once("open", onOpen);
    ws.once("error", onOpenError);
  });
