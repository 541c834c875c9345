import net from "net";

export type TcpProbe = (host: string, port: number, timeoutMs?: number) => Promise<void>;

/** Resolves once a TCP connection to host:port opens; the socket is destroyed either way. */
export const probeTcp: TcpProbe = async (host, port, timeoutMs = 1500) => {
  await new Promise<void>((resolve, reject) => {
    const socket = new net.Socket();
    let done = false;
    function finalize(err?: Error) {
      if (done) return;
      done = true;
      socket.destroy();
      if (err) reject(err);
      else resolve();
    }
    socket.setTimeout(timeoutMs);
    socket.once("error", (err) => finalize(err));
    socket.once("timeout", () => finalize(new Error("timeout")));
    socket.connect(port, host, () => finalize());
  });
};
