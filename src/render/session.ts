/**
 * Render Session: the process-scoped state of one batch.
 *
 * Owns the legacy-format conversion cache, the export selector and the
 * native automation channel. Opened once before the first row, closed
 * once after the last (also when the batch throws).
 */

import os from "os";
import { LibreOfficeEngine, type ConversionEngine } from "../conversion/soffice.js";
import { ConversionCache } from "../conversion/normalizer.js";
import { ExportSelector, type ExportSettings } from "../export/selector.js";
import { MsOfficeChannel, UNAVAILABLE_CHANNEL, type AutomationChannel } from "../export/office_automation.js";
import { silentLogger, type StepLogger } from "../shared/logger.js";

export interface RenderSessionOptions {
  export?: Partial<ExportSettings>;
  sofficeBin?: string;
  logger?: StepLogger;
  /** Parent of every scratch directory (default: OS temp dir). */
  scratchRoot?: string;
  /** Override the LibreOffice engine (tests). */
  _conversion?: ConversionEngine;
  /** Override the automation channel (tests). */
  _channel?: AutomationChannel;
}

export class RenderSession {
  private closed = false;

  private constructor(
    readonly cache: ConversionCache,
    readonly exporter: ExportSelector,
    readonly channel: AutomationChannel,
    readonly logger: StepLogger,
    /** Parent of every scratch directory the session creates. */
    readonly scratchRoot: string,
  ) {}

  static async open(options: RenderSessionOptions = {}): Promise<RenderSession> {
    const logger = options.logger ?? silentLogger;
    const scratchRoot = options.scratchRoot ?? os.tmpdir();
    const conversion = options._conversion ?? new LibreOfficeEngine({ binary: options.sofficeBin });

    let channel = options._channel;
    if (!channel) {
      channel = options.export?.engine === "libreoffice"
        ? UNAVAILABLE_CHANNEL
        : await MsOfficeChannel.open({ logger });
    }

    const cache = new ConversionCache(conversion, { logger, scratchRoot });
    const exporter = new ExportSelector(conversion, channel, {
      settings: options.export,
      logger,
      scratchRoot,
    });
    logger.debug("SESSION", `opened (engine=${exporter.settings.engine}, retries=${exporter.settings.retries})`);
    return new RenderSession(cache, exporter, channel, logger, scratchRoot);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Tear down the channel and delete conversion scratch folders. Idempotent. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.channel.dispose();
    } finally {
      await this.cache.clear();
      this.logger.debug("SESSION", "closed");
    }
  }
}

export async function withRenderSession<T>(
  options: RenderSessionOptions,
  fn: (session: RenderSession) => Promise<T>,
): Promise<T> {
  const session = await RenderSession.open(options);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
