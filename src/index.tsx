#!/usr/bin/env node
import React from 'react';
import { render } from 'ink';
import meow from 'meow';
import { App } from './App.js';
import { DrillConfig, resolveDrillConfig, toSessionSettings } from './config/drillConfig.js';
import { ENV_VARS } from './constants/config.js';
import { ConsoleRenderer } from './services/ConsoleRenderer.js';
import { LineQueue, attachReadable } from './services/LineSource.js';
import { LogLevel, componentLoggers, loggingService } from './services/LoggingService.js';
import { SessionEvents } from './services/SessionEvents.js';
import { runSession } from './services/SessionLoop.js';
import { createStimulusProvider } from './services/StimulusProvider.js';
import { DrillError, ErrorCategory, handleError, toError } from './utils/errorHandler.js';

const cli = meow(`
  Usage
    $ nback [options]

  Options
    --seconds, -s        Seconds allowed per guess (default: 3)
    --provider, -p       Stimulus source: random (default), deck, fixed
    --test               Shorthand for --provider fixed
    --no-show-buffer     Do not list the history after a guess
    --no-reset           Keep the history after a graded guess
    --pause              Milliseconds to pause after a guess (default: 2000)
    --headless           Plain console output, guesses read line by line from stdin
    --debug, -d          Enable debug logging

  Environment
    NBACK_SECONDS, NBACK_PROVIDER, NBACK_DEBUG, NBACK_THEME (light|dark), LOG_LEVEL

  Examples
    $ nback
    $ nback --provider deck --seconds 5
    $ printf '6\\n' | nback --test --headless
`, {
  // leave unset booleans undefined so configured defaults apply
  booleanDefault: undefined,
  flags: {
    seconds: {
      type: 'number',
      alias: 's'
    },
    provider: {
      type: 'string',
      alias: 'p'
    },
    test: {
      type: 'boolean'
    },
    showBuffer: {
      type: 'boolean'
    },
    reset: {
      type: 'boolean'
    },
    pause: {
      type: 'number'
    },
    headless: {
      type: 'boolean'
    },
    debug: {
      type: 'boolean',
      alias: 'd'
    }
  }
});

function loadConfig(): DrillConfig {
  try {
    return resolveDrillConfig(cli.flags);
  } catch (error) {
    if (error instanceof DrillError && error.category === ErrorCategory.CONFIGURATION) {
      console.error(`nback: ${error.message}`);
      cli.showHelp(2);
    }
    throw error;
  }
}

async function runInteractive(config: DrillConfig): Promise<void> {
  const queue = new LineQueue();
  const events = new SessionEvents();
  process.env[ENV_VARS.INK] = 'true';

  const app = render(<App events={events} queue={queue} config={config} />);

  const session = runSession({
    provider: createStimulusProvider(config.provider),
    input: queue,
    settings: toSessionSettings(config),
    events,
  });

  try {
    // Ctrl+C ends the Ink app before the session does
    await Promise.race([session, app.waitUntilExit()]);
    await app.waitUntilExit();
  } catch (error) {
    app.unmount();
    throw error;
  }
}

async function runHeadless(config: DrillConfig): Promise<void> {
  const queue = new LineQueue();
  const events = new SessionEvents();
  const renderer = new ConsoleRenderer(process.stdout);
  const detachRenderer = renderer.attach(events);
  const detachInput = attachReadable(queue, process.stdin);

  try {
    const counters = await runSession({
      provider: createStimulusProvider(config.provider),
      input: queue,
      settings: toSessionSettings(config),
      events,
    });
    loggingService.debug('final counters', counters);
  } finally {
    detachInput();
    detachRenderer();
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  if (config.debug) {
    process.env[ENV_VARS.DEBUG] = 'true';
    loggingService.setLogLevel(LogLevel.DEBUG);
  }
  componentLoggers.config.debug('resolved configuration', config);

  const isInteractive = !!process.stdin.isTTY && !!process.stdout.isTTY && !config.headless;
  if (isInteractive) {
    await runInteractive(config);
  } else {
    await runHeadless(config);
  }
}

main().then(
  () => process.exit(0),
  (error: unknown) => {
    const err = toError(error);
    handleError(err, { operation: 'session' });
    if (err instanceof DrillError && err.category === ErrorCategory.IO) {
      console.error(`nback: ${err.message}`);
    }
    process.exit(1);
  }
);
