import process from "node:process";
import { ChangeJournal } from "./change-journal.js";
import { type Config, resolveFolder } from "./config.js";
import { ChangeCoordinator } from "./coordinator.js";
import { errorMessage, WatchEstablishError } from "./errors.js";
import { ReloadHub } from "./live-reload.js";
import { log } from "./logger.js";
import { canonicalRoot } from "./path-resolver.js";
import { createPreviewServer, type PreviewServer } from "./preview-server.js";
import { RenderCache } from "./render-cache.js";
import { createRenderer, type MarkdownRenderer } from "./render/index.js";
import { type WatchOptions, watchDirectory } from "./watcher.js";

export interface PreviewSession {
  url: string;
  port: number;
  root: string;
  cache: RenderCache;
  hub: ReloadHub;
  journal: ChangeJournal;
  coordinator: ChangeCoordinator;
  close(): Promise<void>;
}

export interface StartPreviewOverrides {
  renderer?: MarkdownRenderer;
  cwd?: string;
  watch?: WatchOptions;
}

/**
 * Wires the pieces together for one folder: watch it, then serve it. The
 * watch is established before the socket is bound, so a folder that cannot be
 * watched never gets a server.
 */
export async function startPreview(
  config: Config,
  overrides: StartPreviewOverrides = {},
): Promise<PreviewSession> {
  const folder = resolveFolder(config, overrides.cwd ?? process.cwd());

  let root: string;
  try {
    root = await canonicalRoot(folder);
  } catch (error) {
    throw new WatchEstablishError(folder, errorMessage(error), error);
  }

  const renderer = overrides.renderer ?? createRenderer(config);
  const cache = new RenderCache({ root, renderer, context: config.context });
  const hub = new ReloadHub({ maxHoldMs: config.maxHoldMs });
  const journal = new ChangeJournal();
  const coordinator = new ChangeCoordinator({
    cache,
    hub,
    journal,
    debounceMs: config.debounceMs,
  });

  const watch = await watchDirectory(root, overrides.watch);
  const pump = coordinator.consume(watch).catch((error: unknown) => {
    log.error(`Change stream for ${root} ended: ${errorMessage(error)}`);
  });

  let server: PreviewServer;
  try {
    server = await createPreviewServer({
      root,
      cache,
      hub,
      journal,
      host: config.host,
      port: config.port,
    });
  } catch (error) {
    coordinator.dispose();
    await watch.close();
    await pump;
    throw error;
  }

  log.debug(`Rendering with the ${renderer.name} renderer`);

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    closing ??= (async () => {
      coordinator.dispose();
      await watch.close();
      await pump;
      await server.close();
    })();
    return closing;
  };

  return {
    url: server.url,
    port: server.port,
    root,
    cache,
    hub,
    journal,
    coordinator,
    close,
  };
}
