/**
 * Find POIs along a GPX route and write them as waypoints.
 *
 * Usage: npx tsx scripts/find-pois.ts <route.gpx> [options]
 *
 *   --out <file>             Output file, .gpx or .json (default: <route>-pois.gpx)
 *   --chunks <n>             Number of route chunks to query (default: 10)
 *   --radius <meters>        Radius for rules that do not set one
 *   --rules <file>           Rule set JSON (default: configs/rules.json)
 *   --classification <file>  Naming/symbol tables (default: configs/classification.json)
 *   --cache-dir <dir>        Query cache (default: $ROUTE_POIS_CACHE_DIR or ~/.route-pois/overpass-cache)
 *   --endpoint <url>         Overpass endpoint (default: $OVERPASS_ENDPOINT or overpass-api.de)
 *   --force                  Re-query even when cached
 *   --no-cache               Neither read nor write the cache
 */

import { basename, dirname, extname, join, resolve } from "node:path";
import {
  DEFAULT_CHUNK_COUNT,
  findPois,
  loadClassificationConfig,
  loadRuleSet,
  readGpxRouteFile,
  withDefaultRadius,
  writePoisFile,
} from "../src/index.js";

// ── CLI ──────────────────────────────────────────────────────────────

const USAGE = "Usage: npx tsx scripts/find-pois.ts <route.gpx> [--out <file>] [--chunks <n>] [--radius <m>] [--rules <file>] [--classification <file>] [--cache-dir <dir>] [--endpoint <url>] [--force] [--no-cache]";

interface CliArgs {
  route: string;
  out?: string;
  chunks: number;
  radius?: number;
  rules?: string;
  classification?: string;
  cacheDir?: string;
  endpoint?: string;
  force: boolean;
  noCache: boolean;
}

function usage(message?: string): never {
  if (message) console.error(message);
  console.error(USAGE);
  process.exit(1);
}

function positiveNumber(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || !Number.isFinite(n) || n <= 0) {
    usage(`${flag} needs a positive number`);
  }
  return n;
}

function parseArgs(argv: string[]): CliArgs {
  const args: Partial<CliArgs> & { force: boolean; noCache: boolean } = {
    force: false,
    noCache: false,
  };
  let chunks = DEFAULT_CHUNK_COUNT;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = () => argv[++i] ?? usage(`${arg} needs a value`);
    switch (arg) {
      case "--out": args.out = value(); break;
      case "--chunks": chunks = positiveNumber(arg, value()); break;
      case "--radius": args.radius = positiveNumber(arg, value()); break;
      case "--rules": args.rules = value(); break;
      case "--classification": args.classification = value(); break;
      case "--cache-dir": args.cacheDir = value(); break;
      case "--endpoint": args.endpoint = value(); break;
      case "--force": args.force = true; break;
      case "--no-cache": args.noCache = true; break;
      case "-h":
      case "--help": return usage();
      default:
        if (arg === undefined || arg.startsWith("-") || args.route) {
          usage(`unexpected argument: ${arg}`);
        }
        args.route = arg;
    }
  }

  if (!args.route) usage();
  if (!Number.isInteger(chunks)) usage("--chunks needs a whole number");
  return { ...args, route: args.route, chunks };
}

// ── Main ─────────────────────────────────────────────────────────────

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const routePath = resolve(args.route);
  const outPath = resolve(
    args.out ?? join(dirname(routePath), `${basename(routePath, extname(routePath))}-pois.gpx`)
  );

  const route = readGpxRouteFile(routePath);
  let rules = loadRuleSet(args.rules);
  if (args.radius !== undefined) rules = withDefaultRadius(rules, args.radius);
  const classification = loadClassificationConfig(args.classification);

  const result = await findPois(route, {
    rules,
    classification,
    chunkCount: args.chunks,
    cacheDir: args.cacheDir ?? process.env["ROUTE_POIS_CACHE_DIR"],
    endpoint: args.endpoint ?? process.env["OVERPASS_ENDPOINT"],
    force: args.force,
    noCache: args.noCache,
  });

  writePoisFile(outPath, result.pois);

  console.log("");
  console.log("=== Symbols ===");
  for (const [symbol, count] of Object.entries(result.stats.bySymbol)) {
    console.log(`  ${symbol}: ${count}`);
  }
  console.log(`  (none): ${result.stats.withoutSymbol}`);
  console.log("");
  console.log(`output: ${outPath}`);
}

main().catch((err) => {
  console.error(`[error] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
