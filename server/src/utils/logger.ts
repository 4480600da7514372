/**
 * Logger utility: tagged console logging, one tag per concern.
 *
 * Usage:
 *   import { log } from "../utils/logger";
 *   log.search("nearText", { targetVector: "text_vector", limit: 10 });
 *   log.warn("image", "Stored image could not be decoded");
 *   log.error("weaviate", "Connection failed", err);
 */

export type Tag = "server" | "config" | "weaviate" | "search" | "image" | "http";

function fmt(tag: Tag, msg: string): string {
  const ts = new Date().toISOString().slice(11, 23); // HH:mm:ss.sss
  return `[${ts}][${tag.toUpperCase()}] ${msg}`;
}

function info(tag: Tag, msg: string, data?: unknown) {
  if (data !== undefined) {
    console.log(fmt(tag, msg), data);
  } else {
    console.log(fmt(tag, msg));
  }
}

function warn(tag: Tag, msg: string, data?: unknown) {
  if (data !== undefined) {
    console.warn(fmt(tag, msg), data);
  } else {
    console.warn(fmt(tag, msg));
  }
}

function error(tag: Tag, msg: string, err?: unknown) {
  const errMsg = err instanceof Error ? err.message : String(err ?? "");
  console.error(fmt(tag, `${msg}${errMsg ? ": " + errMsg : ""}`));
}

export const log = {
  server: (msg: string, data?: unknown) => info("server", msg, data),
  config: (msg: string, data?: unknown) => info("config", msg, data),
  weaviate: (msg: string, data?: unknown) => info("weaviate", msg, data),
  search: (msg: string, data?: unknown) => info("search", msg, data),
  image: (msg: string, data?: unknown) => info("image", msg, data),
  http: (msg: string, data?: unknown) => info("http", msg, data),
  warn: (tag: Tag, msg: string, data?: unknown) => warn(tag, msg, data),
  error: (tag: Tag, msg: string, err?: unknown) => error(tag, msg, err),
};
