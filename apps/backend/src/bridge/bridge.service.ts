import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { BridgeStats, RecordOutcome } from './bridge.types';
import { EnrichmentService } from '../enrichment/enrichment.service';
import { POSITION_SOURCE, PositionSource } from '../gps/gps.types';
import { PublisherService } from '../publisher/publisher.service';
import { ReconnectingStreamService } from '../serial/reconnecting-stream.service';

@Injectable()
export class BridgeService implements OnApplicationShutdown {
  private readonly logger = new Logger(BridgeService.name);
  private readonly stationary: boolean;
  private readonly stats: BridgeStats = { published: 0, rejected: 0, failed: 0 };
  private abortController?: AbortController;
  private pipeline?: Promise<void>;
  private stopping?: Promise<void>;

  constructor(
    private readonly stream: ReconnectingStreamService,
    private readonly enrichment: EnrichmentService,
    private readonly publisher: PublisherService,
    @Inject(POSITION_SOURCE) private readonly positionSource: PositionSource,
    configService: ConfigService,
  ) {
    this.stationary = configService.get<boolean>('gps.stationary', false);
  }

  get running(): boolean {
    return Boolean(this.pipeline) && !this.stopping;
  }

  getStats(): BridgeStats {
    return { ...this.stats };
  }

  /**
   * Opens the position source and binds the publisher, then starts draining
   * the serial stream in the background. Rejects only when the publisher
   * cannot bind.
   */
  async start(): Promise<void> {
    if (this.pipeline) {
      return;
    }
    await this.positionSource.open(this.stationary ? 'fixed' : 'continuous');
    try {
      await this.publisher.bind();
    } catch (error) {
      await this.positionSource.close();
      throw error;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.stopping = undefined;
    this.pipeline = this.run(controller.signal);
    this.logger.log(
      `Bridge running (${this.stationary ? 'stationary' : 'mobile'} position mode)`,
    );
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  processRecord(line: string): RecordOutcome {
    try {
      const result = this.enrichment.enrich(line);
      if (!result.ok) {
        this.stats.rejected += 1;
        this.logger.warn(`${result.error.message} (line: ${line})`);
        return 'rejected';
      }
      this.publisher.publish(result.event);
      this.stats.published += 1;
      return 'published';
    } catch (error) {
      this.stats.failed += 1;
      this.logger.error(
        `Unexpected error: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return 'failed';
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      for await (const line of this.stream.records(signal)) {
        this.processRecord(line);
      }
    } catch (error) {
      this.logger.error(
        `Serial pipeline stopped: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async shutdown(): Promise<void> {
    this.abortController?.abort();
    this.abortController = undefined;
    if (this.pipeline) {
      this.logger.log('Shutting down bridge...');
      await this.pipeline;
      this.pipeline = undefined;
    }
    await this.publisher.close();
    await this.positionSource.close();
  }
}
