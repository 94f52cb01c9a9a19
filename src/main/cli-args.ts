export interface CliArgs {
  pluginsDir?: string;
  run?: string;
  menu?: string;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--run' && i + 1 < argv.length) {
      args.run = argv[++i];
    } else if (arg === '--menu' && i + 1 < argv.length) {
      args.menu = argv[++i];
    } else if (!arg.startsWith('--') && args.pluginsDir === undefined) {
      args.pluginsDir = arg;
    }
  }
  return args;
}
