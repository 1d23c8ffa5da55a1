/**
 * Gateway Application
 *
 * Bootstrap + lifecycle management for the local two-chain devnet.
 *
 * Lifecycle:
 * - On startup: build the devnet, log committed chain events, start the
 *   claim relayers for both directions, then serve HTTP
 * - On shutdown: stop the relayers, then close the HTTP server
 */

// Load environment variables from .env file
import 'dotenv/config';

import express, { Express } from 'express';

import { loadConfigFromEnv } from './config.js';
import type { GatewayAppConfig } from './config.js';
import { createRoutes, errorHandler } from './http/index.js';
import { createDevnet } from './local/index.js';
import type { CommittedEvent, Devnet, DevnetSide } from './local/index.js';
import { ConsoleMetrics, NoOpMetrics } from './observability/index.js';
import { ClaimRelayer } from './relayer/index.js';
import { createLogger, Logger } from './utils/index.js';

// =============================================================================
// GATEWAY APPLICATION
// =============================================================================

export class GatewayApp {
  private config: GatewayAppConfig;
  private logger: Logger;
  private app: Express;
  readonly devnet: Devnet;
  private relayers: ClaimRelayer[] = [];
  private server?: ReturnType<Express['listen']>;
  private shutdownPromise?: Promise<void>;

  constructor(config: GatewayAppConfig) {
    this.config = config;
    this.logger = createLogger({ level: config.logLevel, service: 'cctp-gateway' });
    this.app = express();
    this.devnet = createDevnet({
      domains: { l1: config.l1Domain, l2: config.l2Domain },
      maxBurnAmountPerMessage: config.maxBurnAmountPerMessage,
    });
  }

  /**
   * Start the application.
   *
   * 1. Subscribe to committed chain events
   * 2. Start relayers (unless disabled)
   * 3. Start HTTP server
   */
  async start(): Promise<void> {
    this.logger.info({}, 'Starting CCTP gateway devnet...');

    for (const side of [this.devnet.l1, this.devnet.l2]) {
      this.logChainEvents(side);
    }
    this.logger.info(
      {
        l1Gateway: this.devnet.l1.gateway.address,
        l2Gateway: this.devnet.l2.gateway.address,
        attester: this.devnet.attestations.attester,
      },
      'Devnet deployed'
    );

    if (this.config.relayerEnabled) {
      const metrics = this.config.consoleMetrics ? new ConsoleMetrics() : new NoOpMetrics();
      for (const [source, destination] of [
        [this.devnet.l1, this.devnet.l2],
        [this.devnet.l2, this.devnet.l1],
      ]) {
        const relayer = new ClaimRelayer({
          source,
          destination,
          attestations: this.devnet.attestations,
          relayer: destination.chain.deriveAddress('accounts/relayer'),
          logger: this.logger,
          metrics,
          timeouts: {
            attestationTimeoutMs: this.config.attestationTimeoutMs,
            submissionTimeoutMs: this.config.submissionTimeoutMs,
          },
          maxAttempts: this.config.maxAttempts,
        });
        relayer.start(this.config.relayerIntervalMs);
        this.relayers.push(relayer);
      }
    } else {
      this.logger.warn({}, 'Claim relayer disabled - transfers must be claimed manually');
    }

    // Setup HTTP server
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(createRoutes(this.devnet, this.logger, { defaultGasLimit: this.config.defaultGasLimit }));
    this.app.use(errorHandler(this.logger));

    // Start listening
    await new Promise<void>((resolve) => {
      this.server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info(
          { port: this.config.port, host: this.config.host },
          'Gateway HTTP server started'
        );
        resolve();
      });
    });

    // Setup shutdown handlers
    this.setupShutdownHandlers();

    this.logger.info({}, 'Gateway started successfully');
  }

  /**
   * Stop the application gracefully. Idempotent.
   */
  async stop(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = this.doStop();
    return this.shutdownPromise;
  }

  private async doStop(): Promise<void> {
    this.logger.info({}, 'Stopping Gateway...');

    for (const relayer of this.relayers) {
      relayer.stop();
    }

    // Stop HTTP server
    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      this.logger.info({}, 'HTTP server stopped');
    }

    this.logger.info({}, 'Gateway stopped');
  }

  private logChainEvents(side: DevnetSide): void {
    const logger = this.logger.child({ chain: side.side });
    side.chain.onEvent(({ event, txIndex }: CommittedEvent) => {
      switch (event.type) {
        case 'DEPOSIT_INITIATED':
          logger.info({ txIndex, nonce: event.nonce, from: event.from, to: event.to, amount: event.amount }, 'Deposit initiated');
          break;
        case 'WITHDRAW_FINALIZED':
          logger.info({ txIndex, nonce: event.nonce, to: event.to, amount: event.amount }, 'Withdraw finalized');
          break;
        case 'TRANSFER_CLAIMED':
          logger.info({ txIndex, nonce: event.nonce, claimer: event.claimer }, 'Transfer claimed');
          break;
        case 'CIRCLE_CALLER_UPDATED':
          logger.warn(
            { txIndex, tokenMessenger: event.tokenMessenger, messageTransmitter: event.messageTransmitter },
            'Circle contracts updated'
          );
          break;
        case 'PAUSE_CHANGED':
          logger.warn({ txIndex, flow: event.flow, paused: event.paused }, 'Pause flag changed');
          break;
        case 'CCTP_MESSAGE_SENT':
        case 'CCTP_MESSAGE_RECEIVED':
          logger.debug({ txIndex, sourceDomain: event.sourceDomain, nonce: event.nonce }, event.type);
          break;
        default:
          logger.debug({ txIndex }, event.type);
      }
    });
  }

  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string) => {
      this.logger.info({ signal }, 'Received shutdown signal');
      await this.stop();
      process.exit(0);
    };

    const onSignal = (signal: string) => {
      shutdown(signal).catch((err: unknown) => {
        this.logger.error({ error: err }, 'Shutdown failed');
        process.exit(1);
      });
    };

    process.on('SIGINT', () => onSignal('SIGINT'));
    process.on('SIGTERM', () => onSignal('SIGTERM'));
  }
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const app = new GatewayApp(config);
  await app.start();
}

// Run if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
