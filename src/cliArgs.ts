export interface CliOptions {
  assumeYes: boolean;
  limit?: number;
  help: boolean;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { assumeYes: false, help: false };
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg === '--yes' || arg === '-y') {
      options.assumeYes = true;
    } else if (arg === '--limit') {
      const limit = next === undefined ? Number.NaN : Number.parseInt(next, 10);
      if (Number.isNaN(limit) || limit < 0) {
        throw new Error(`--limit expects a non-negative integer, got "${next ?? ''}"`);
      }
      options.limit = limit;
      i += 1;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return options;
}

export const USAGE = [
  'Usage: prestashop-image-migrator [options]',
  '',
  'Stages PrestaShop product images from FTP, writes an extraction report,',
  'then uploads them to WooCommerce after confirmation.',
  '',
  'Options:',
  '  -y, --yes        upload without asking for confirmation',
  '  --limit <n>      only walk the first n product directories',
  '  -h, --help       show this help'
].join('\n');
