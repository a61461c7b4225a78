import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

const pad = (n: number) => String(n).padStart(2, "0");

export interface AccessLogEntry {
  remoteAddr: string;
  time: Date;
  method: string;
  url: string;
  httpVersion: string;
  status: number;
  size: number;
}

/** `dd/Mon/yyyy:HH:mm:ss +0000`, always UTC. */
export const formatLogTimestamp = (d: Date) =>
  `${pad(d.getUTCDate())}/${MONTHS[d.getUTCMonth()]}/${d.getUTCFullYear()}:` +
  `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())} +0000`;

// Common Log Format
export const formatAccessLine = (e: AccessLogEntry) =>
  `${e.remoteAddr} - - [${formatLogTimestamp(e.time)}] ` +
  `"${e.method} ${e.url} HTTP/${e.httpVersion}" ${e.status} ${e.size}`;

export const accessLog =
  (logger: Logger) => (req: Request, res: Response, next: NextFunction) => {
    const time = new Date();
    const start = process.hrtime.bigint();

    // Count body bytes on their way to the socket; Content-Length is gone once a body is gzipped.
    let size = 0;
    const count = (chunk: unknown, encoding: unknown) => {
      if (typeof chunk === "string") {
        const enc = typeof encoding === "string" && Buffer.isEncoding(encoding) ? encoding : "utf8";
        size += Buffer.byteLength(chunk, enc);
      } else if (chunk instanceof Uint8Array) {
        size += chunk.byteLength;
      }
    };
    res.write = new Proxy(res.write, {
      apply(target, thisArg, args: unknown[]) {
        count(args[0], args[1]);
        return Reflect.apply(target, thisArg, args);
      },
    });
    res.end = new Proxy(res.end, {
      apply(target, thisArg, args: unknown[]) {
        if (typeof args[0] !== "function") count(args[0], args[1]);
        return Reflect.apply(target, thisArg, args);
      },
    });

    res.on("finish", () => {
      const ms = Number(process.hrtime.bigint() - start) / 1_000_000;
      const entry: AccessLogEntry = {
        remoteAddr: req.ip || req.socket.remoteAddress || "-",
        time,
        method: req.method,
        url: req.originalUrl,
        httpVersion: req.httpVersion,
        status: res.statusCode,
        size,
      };

      logger.info(
        { method: entry.method, url: entry.url, status: entry.status, size, ms },
        formatAccessLine(entry),
      );
    });

    next();
  };
