export interface ExtractArgs {
  keyword: string;
  domain: string;
  pages: number;
  /** Wipe the link registry before extracting */
  resetRegistry: boolean;
  help: boolean;
}

export const USAGE = `Usage: npm run extract -- <keyword> <domain> [--pages N] [--reset-registry]

Extract references, videos and links about <keyword> from <domain>.

Options:
  --pages N           Pages to scan for links (default: 3)
  --reset-registry    Clear the link registry first
  --help              Show this message`;

/**
 * Split argv into positionals and `--flag [value]` pairs
 */
export function parseFlags(argv: string[]): { positionals: string[]; flags: Record<string, string | boolean> } {
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      positionals.push(token);
      continue;
    }
    const [key, inlineValue] = token.slice(2).split('=', 2);
    if (inlineValue !== undefined) {
      flags[key] = inlineValue;
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--') && key === 'pages') {
      flags[key] = next;
      i++;
    } else {
      flags[key] = true;
    }
  }

  return { positionals, flags };
}

export function parseExtractArgs(argv: string[]): ExtractArgs {
  const { positionals, flags } = parseFlags(argv);
  const help = flags.help === true;

  const [keyword = '', domain = ''] = positionals;
  if (!help && (!keyword.trim() || !domain.trim())) {
    throw new Error('A keyword and a domain are required');
  }

  let pages = 3;
  if (flags.pages !== undefined) {
    pages = Number(flags.pages);
    if (typeof flags.pages !== 'string' || !Number.isInteger(pages) || pages < 1) {
      throw new Error(`--pages must be a positive integer, got "${String(flags.pages)}"`);
    }
  }

  return {
    keyword: keyword.trim(),
    domain: domain.trim(),
    pages,
    resetRegistry: flags['reset-registry'] === true,
    help,
  };
}
