#!/usr/bin/env tsx
/**
 * Writes the event service schema as a JSON descriptor, for hosts that cannot
 * read .proto files at run time. Load it with `EventServiceSchema.fromJSON`.
 *
 * Usage: tsx scripts/compile-schema.ts [outFile]
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { loadEventServiceSchema } from "../src/node";

const outFile = resolve(process.argv[2] ?? "dist/event_service.json");
const schema = loadEventServiceSchema();

mkdirSync(dirname(outFile), { recursive: true });
writeFileSync(outFile, `${JSON.stringify(schema.toJSON(), null, 2)}\n`);
console.info(`[compile-schema] wrote ${schema.methodPath} descriptor to ${outFile}`);
