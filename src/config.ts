import {parseArgs} from 'node:util';
import {z} from 'zod';
import {GenerationError} from './errors.js';

const ColorArg = z.string().trim().min(1, 'color must not be empty');

const CliSchema = z.object({
  fillColor: ColorArg.default('black'),
  strokeColor: ColorArg.default('black'),
  root: z.string().min(1),
  converter: z.enum(['inkscape', 'sharp']).default('inkscape'),
  inkscapeBin: z.string().min(1).optional(),
  listColors: z.boolean().default(false),
  help: z.boolean().default(false),
});

export type CliConfig = z.infer<typeof CliSchema>;

export const USAGE = `Usage: icon-tint [fill-color] [stroke-color] [options]

Options:
  --fill-color <color>     named color or #RRGGBB (default: black)
  --stroke-color <color>   named color or #RRGGBB (default: black)
  --root <dir>             project root holding svg/ (default: cwd)
  --converter <name>       inkscape | sharp (default: inkscape)
  --list-colors            print the known color names and exit
  -h, --help               show this help`;

export class ConfigError extends GenerationError {}

function tokenize(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        'fill-color': { type: 'string' },
        'stroke-color': { type: 'string' },
        root: { type: 'string' },
        converter: { type: 'string' },
        'list-colors': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (e) {
    throw new ConfigError(e instanceof Error ? e.message : String(e));
  }
}

/**
 * Flags win over positionals. ICON_TINT_INKSCAPE points at a non-default inkscape binary.
 */
export function parseCliConfig(argv: string[], env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): CliConfig {
  const { values, positionals } = tokenize(argv);
  if (positionals.length > 2) throw new ConfigError(`Unexpected argument: ${positionals[2]}`);

  const res = CliSchema.safeParse({
    fillColor: values['fill-color'] ?? positionals[0],
    strokeColor: values['stroke-color'] ?? positionals[1],
    root: values.root ?? cwd,
    converter: values.converter,
    inkscapeBin: env.ICON_TINT_INKSCAPE || undefined,
    listColors: values['list-colors'],
    help: values.help,
  });
  if (!res.success) {
    throw new ConfigError('Invalid options: ' + res.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return res.data;
}
