import fs from "node:fs/promises";
import type { Server } from "node:http";
import express from "express";
import type { Logger } from "../core/logger.js";

export interface RepoServerOptions {
  port: number;
  host: string;
  /** Address the machines use to reach this server; defaults to `host`. */
  advertiseHost?: string;
}

export interface RepoServer {
  /** Base URL, with a trailing slash. */
  url: string;
  close(): Promise<void>;
}

/** Serves the internal repositories read-only over HTTP, one directory per distribution. */
export async function startRepoServer(rootDir: string, options: RepoServerOptions, logger: Logger): Promise<RepoServer> {
  await fs.mkdir(rootDir, { recursive: true });
  const app = express();
  app.disable("x-powered-by");
  app.use(express.static(rootDir, { index: false, dotfiles: "ignore" }));

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(options.port, options.host);
    listening.once("listening", () => resolve(listening));
    listening.once("error", reject);
  });

  const address = server.address();
  const port = address !== null && typeof address === "object" ? address.port : options.port;
  const url = `http://${options.advertiseHost ?? options.host}:${port}/`;
  logger.info(`serving ${rootDir} at ${url}`);

  return {
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
}

/** Runs `fn` with the repository server up; the server is stopped on every exit. */
export async function withRepoServer<T>(
  rootDir: string,
  options: RepoServerOptions,
  logger: Logger,
  fn: (server: RepoServer) => Promise<T>
): Promise<T> {
  const server = await startRepoServer(rootDir, options, logger);
  try {
    return await fn(server);
  } finally {
    await server.close();
    logger.debug("repository server stopped");
  }
}
