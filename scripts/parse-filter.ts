#!/usr/bin/env tsx
/**
 * Filter Tree Dump
 *
 * Parses a $filter expression against a JSON model and prints the typed tree.
 *
 * Usage:
 *   npm run parse -- --model tests/fixtures/customer-model.json \
 *     --entity-set Customers --filter "geo.distance(Home, Office) lt 0.5"
 *   npm run parse -- --service-root http://host/svc/ \
 *     --url "http://host/svc/Customers?\$filter=Age+gt+30"
 */

import { config } from 'dotenv';
import { loadFilterConfig } from '../src/config/filter.js';
import { ModelFileLoader } from '../src/edm/ModelFileLoader.js';
import { FilterParserError } from '../src/filter/FilterParserError.js';
import { createFilterContext, parseAndRender } from '../src/index.js';
import { readFilterRequest } from '../src/uri/FilterRequestReader.js';

config();

interface CliOptions {
  modelPath?: string;
  entitySet?: string;
  filter?: string;
  url?: string;
  serviceRoot?: string;
}

/**
 * Parse CLI arguments
 */
function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const options: CliOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === '--model' && next !== undefined) {
      options.modelPath = next;
      i++;
    } else if (arg === '--entity-set' && next !== undefined) {
      options.entitySet = next;
      i++;
    } else if (arg === '--filter' && next !== undefined) {
      options.filter = next;
      i++;
    } else if (arg === '--url' && next !== undefined) {
      options.url = next;
      i++;
    } else if (arg === '--service-root' && next !== undefined) {
      options.serviceRoot = next;
      i++;
    } else if (arg === '--help' || arg === '-h') {
      printUsage();
      process.exit(0);
    } else {
      console.error(`Unknown or incomplete option: ${arg}`);
      printUsage();
      process.exit(1);
    }
  }

  return options;
}

function printUsage(): void {
  console.log(`
Parse an OData $filter expression and print its typed tree

Usage:
  npm run parse -- [options]

Options:
  --model <path>          JSON model document (default: ODATA_FILTER_MODEL_PATH)
  --entity-set <name>     Entity set the filter applies to
  --filter <expression>   Filter expression
  --url <request-url>     Request URL carrying $filter (instead of --entity-set/--filter)
  --service-root <url>    Service root the request URL lives under
  --help, -h              Show this help
`);
}

function resolveRequest(options: CliOptions): { entitySet: string; filter: string } {
  if (options.url) {
    if (!options.serviceRoot) {
      throw new Error('--service-root is required with --url');
    }
    const request = readFilterRequest(options.serviceRoot, options.url);
    if (request.filter === null) {
      throw new Error(`Request URL has no $filter: ${options.url}`);
    }
    return { entitySet: request.entitySet, filter: request.filter };
  }

  if (!options.entitySet || options.filter === undefined) {
    throw new Error('Pass --entity-set and --filter, or --url with --service-root');
  }
  return { entitySet: options.entitySet, filter: options.filter };
}

function main(): void {
  const options = parseArgs();
  const settings = loadFilterConfig({ modelPath: options.modelPath });
  const model = new ModelFileLoader(settings.maxModelBytes).load(settings.modelPath);
  const { entitySet, filter } = resolveRequest(options);

  const context = createFilterContext(model, entitySet, settings.rangeVariable);
  console.log(parseAndRender(filter, context));
}

try {
  main();
} catch (err) {
  console.error('\n❌ Filter parsing failed:');

  if (err instanceof FilterParserError) {
    console.error(`${err.kind}: ${err.message}`);
    if (err.hint) {
      console.error(`\n💡 Hint: ${err.hint}`);
    }
  } else if (err instanceof Error) {
    console.error('Message:', err.message);
    if (err.message.includes('ODATA_FILTER_MODEL_PATH')) {
      console.error('\n💡 Hint: Create a .env file or pass --model <path>.');
    }
  } else {
    console.error(err);
  }

  process.exit(1);
}
