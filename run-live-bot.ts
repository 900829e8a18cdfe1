import 'dotenv/config';
import type { Server } from 'http';
import { pathToFileURL } from 'url';
import { AlpacaBrokerClient, AlpacaMarketDataClient } from './lib/alpaca';
import { loadConfig, loadCredentials, type BotConfig } from './lib/config';
import { ConfigurationError, errorMessage } from './lib/errors';
import { FillDispatcher } from './lib/fillDispatcher';
import { GradeRadar } from './lib/gradeEngine';
import { startHealthServer } from './lib/healthServer';
import { ImbalanceSignalDetector } from './lib/imbalanceSignalDetector';
import { createNotifier, safeSend } from './lib/notifier';
import { PositionTracker } from './lib/positionTracker';
import { TradeLifecycleManager } from './lib/tradeLifecycleManager';
import { TradeUpdatesStream } from './lib/tradeUpdatesStream';
import type { Notifier } from './types';

export interface RunningBot {
  task: Promise<void>;
  shutdown: (reason?: string) => Promise<void>;
}

function startupNotice(config: BotConfig): string {
  return [
    '🤖 BOT STARTED',
    `Tickers: ${config.symbols.join(', ')}`,
    `Position: ${config.notionalUsd}$ x ${config.openTradeCount}`,
    `TP: +${config.takeProfitPct}% | SL: -${config.stopLossPct}%`,
    `Max hold: ${config.maxHoldMinutes}m`,
    `Auto trade: ${config.autoTrade ? 'ON' : 'OFF'}`,
  ].join('\n');
}

export async function startLiveBot(): Promise<RunningBot> {
  const config = loadConfig();
  const credentials = loadCredentials();

  const notifier: Notifier = createNotifier(credentials.telegramBotToken, credentials.telegramChatId);
  const marketData = new AlpacaMarketDataClient(credentials);
  const broker = new AlpacaBrokerClient(credentials);

  const detector = new ImbalanceSignalDetector(marketData, notifier, config);
  const tracker = new PositionTracker(marketData, broker, notifier, config);
  const dispatcher = new FillDispatcher(tracker, broker, config.fillQueueCapacity);
  const radar = config.radarEnabled ? new GradeRadar(notifier, config) : null;
  const lifecycle = new TradeLifecycleManager(marketData, broker, notifier, config, { radar });
  const stream = new TradeUpdatesStream({ credentials });

  let server: Server | null = null;
  try {
    server = await startHealthServer(config.healthPort);
  } catch (err) {
    console.warn(`[live-bot] Health server unavailable: ${errorMessage(err)}`);
  }

  dispatcher.start();
  stream.onFill(event => {
    dispatcher.offer(event);
  });
  stream.onReconnectFailed(attempts => {
    void safeSend(notifier, `⚠️ Fill stream lost after ${attempts} reconnect attempts; position tracking paused`);
  });
  stream.connect();

  await safeSend(notifier, startupNotice(config));

  const task = Promise.all([detector.start(), lifecycle.start()]).then(() => undefined);

  let stopped = false;
  const shutdown = async (reason = 'external') => {
    if (stopped) return;
    stopped = true;
    console.log(`[live-bot] Shutting down (${reason})`);
    detector.stop();
    lifecycle.stop();
    stream.close();
    await dispatcher.stop();
    await tracker.stopAll();
    if (server) {
      const closing = server;
      await new Promise<void>(resolve => closing.close(() => resolve()));
    }
  };

  return { task, shutdown };
}

let invokedAsScript = false;
if (typeof process !== 'undefined' && Array.isArray(process.argv) && process.argv[1]) {
  try {
    invokedAsScript = import.meta.url === pathToFileURL(process.argv[1]).href;
  } catch {
    invokedAsScript = false;
  }
}

if (invokedAsScript) {
  startLiveBot()
    .then(bot => {
      const handle = (signal: 'SIGINT' | 'SIGTERM') => {
        bot
          .shutdown(signal)
          .then(() => process.exit(0))
          .catch(err => {
            console.error('[live-bot] Failed to shutdown cleanly:', err);
            process.exit(1);
          });
      };
      process.once('SIGINT', () => handle('SIGINT'));
      process.once('SIGTERM', () => handle('SIGTERM'));
      return bot.task;
    })
    .catch(err => {
      if (err instanceof ConfigurationError) {
        console.error(`[live-bot] ❌ Configuration error (${err.key}): ${err.message}`);
      } else {
        console.error('[live-bot] crashed:', err);
      }
      process.exit(1);
    });
}
