#!/usr/bin/env node
import { startPluginHost } from './plugin-host';
import { HeadlessUIBridge } from './services/headless-ui-bridge';
import { formatPluginRecord } from './services/plugin-loader';
import { appLog, configureLogging } from './services/log-service';
import { getHostSettings } from './services/host-settings';
import { parseCliArgs } from './cli-args';

async function main(): Promise<void> {
  const settings = getHostSettings();
  configureLogging({ level: settings.logLevel, file: settings.logFile });

  const args = parseCliArgs(process.argv.slice(2));
  const host = await startPluginHost({ pluginsDir: args.pluginsDir });

  process.stdout.write(`Plugins in ${host.pluginsDir}:\n`);
  for (const record of host.records) {
    process.stdout.write(`  ${formatPluginRecord(record)}\n`);
  }

  if (!(host.ui instanceof HeadlessUIBridge)) return;
  const ui = host.ui;
  if (args.run) {
    const result = ui.trigger(args.run, args.menu);
    process.stdout.write(`Run "${args.run}": ${result}\n`);
    for (const message of ui.getMessages()) {
      process.stdout.write(`  ${message.title}: ${message.text}\n`);
    }
  }
  process.stdout.write(`${ui.renderSnapshot()}\n`);
}

main().catch((err) => {
  appLog('core:cli', 'error', 'Plugin host failed', {
    meta: { error: err instanceof Error ? err.message : String(err), stack: err instanceof Error ? err.stack : undefined },
  });
  process.exitCode = 1;
});
