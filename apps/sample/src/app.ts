import type { Logger } from 'pino';
import {
  TimerCancelledError,
  TimerRegistry,
  systemClock,
  timeUntilMidnight,
  type Clock,
  type Unsubscribe,
} from '@named-timers/timers';

import type { SampleConfig } from './config';
import { formatDuration, formatTimestamp } from './format';

const ONE_DAY_MS = 24 * 60 * 60 * 1000;
const ONE_WEEK_MS = 7 * ONE_DAY_MS;

export const SAMPLE_TIMER_NAMES = {
  fast: '5SecTimer',
  halfMinute: '30SecTimer',
  minute: '60SecTimer',
  day: '1DayTimer',
  week: '1WeekTimer',
  midnight: 'midnight',
} as const;

export type SampleAppOptions = {
  config: SampleConfig;
  logger: Logger;
  registry?: TimerRegistry;
  random?: () => number;
  now?: Clock;
};

export type SampleApp = {
  registry: TimerRegistry;
  start(): void;
  stop(): Promise<void>;
};

export function createSampleApp(options: SampleAppOptions): SampleApp {
  const { config, logger } = options;
  const now = options.now ?? systemClock;
  const random = options.random ?? Math.random;
  const registry = options.registry ?? new TimerRegistry({ logger, now });

  const subscriptions: Unsubscribe[] = [];
  let midnight: Promise<void> | null = null;
  let started = false;

  const timestamp = () => formatTimestamp(new Date(now()));

  const registerObservers = () => {
    subscriptions.push(
      registry.onFailure(({ name, error }) => {
        logger.warn({ timer: name, err: error, at: timestamp() }, 'sample.timer.failed');
        if (config.removeOnFailure) {
          registry.removeTimer(name);
        }
      }),
      registry.onSuccess(({ name, interval }) => {
        logger.debug(
          { timer: name, every: formatDuration(interval), at: timestamp() },
          'sample.timer.succeeded',
        );
      }),
    );
  };

  const registerTimers = () => {
    registry.addTimer(SAMPLE_TIMER_NAMES.fast, config.fastIntervalMs, () => {
      if (random() * 100 < config.failureRatePercent) {
        throw new Error('Randomly generated failure for testing, you can ignore this.');
      }
      logger.info({ at: timestamp() }, 'sample.fast_timer.ticked');
    });
    registry.addTimer(SAMPLE_TIMER_NAMES.halfMinute, 30_000, () => {
      logger.info({ at: timestamp() }, 'sample.half_minute_timer.ticked');
    });
    registry.addTimer(SAMPLE_TIMER_NAMES.minute, 60_000, () => {
      logger.info({ at: timestamp() }, 'sample.minute_timer.ticked');
    });
    registry.addTimer(SAMPLE_TIMER_NAMES.day, ONE_DAY_MS, () => {
      logger.info({ at: timestamp() }, 'sample.day_timer.ticked');
    });
    registry.addTimer(
      SAMPLE_TIMER_NAMES.week,
      registry.getTimeSpanUntil(now() + ONE_WEEK_MS),
      () => {
        logger.info({ at: timestamp() }, 'sample.week_timer.ticked');
      },
    );

    midnight = registry
      .addOneShot(
        SAMPLE_TIMER_NAMES.midnight,
        () => formatTimestamp(new Date(now())),
        timeUntilMidnight(0, now),
      )
      .then(
        (at) => {
          logger.info({ at }, 'sample.midnight.reached');
        },
        (err: unknown) => {
          if (err instanceof TimerCancelledError) {
            logger.debug({ timer: SAMPLE_TIMER_NAMES.midnight }, 'sample.midnight.cancelled');
            return;
          }
          logger.error({ err }, 'sample.midnight.failed');
        },
      );
  };

  return {
    registry,
    start() {
      if (started) {
        return;
      }
      started = true;
      registerObservers();
      registerTimers();
      logger.debug({ timers: registry.getTimerNames() }, 'sample.timers.registered');
      logger.info({ at: timestamp() }, 'sample.started');
    },
    async stop() {
      for (const unsubscribe of subscriptions.splice(0)) {
        unsubscribe();
      }
      registry.dispose();
      if (midnight) {
        await midnight;
      }
      logger.info({ at: timestamp() }, 'sample.stopped');
    },
  };
}
