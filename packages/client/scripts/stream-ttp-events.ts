#!/usr/bin/env tsx

/**
 * Streams token-transfer events for a ledger range and prints them.
 *
 *   tsx scripts/stream-ttp-events.ts <server> <startLedger> <endLedger> [accountId...]
 *
 * EVENT_SERVICE_API_KEY, when set, is sent as a bearer token.
 */
import { ConsoleSink, createConsoleLogger, EventClient, isEventClientError, pipeToSink } from "../src";

const USAGE = "usage: stream-ttp-events <server> <startLedger> <endLedger> [accountId...]";

async function main(): Promise<void> {
  const [server, start, end, ...accountIds] = process.argv.slice(2);
  if (!server || !start || !end) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const client = new EventClient(server, {
    apiKey: process.env.EVENT_SERVICE_API_KEY || undefined,
    logger: createConsoleLogger(),
  });
  console.log(client.getInfo());

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  try {
    const stream = client.getTtpEvents(Number(start), Number(end), accountIds, { signal: controller.signal });
    const written = await pipeToSink(stream, new ConsoleSink("ttp"));
    console.log(`Received ${written} events`);
    console.log("Metrics:", stream.getMetrics());
  } finally {
    await client.close();
  }
}

main().catch((error: unknown) => {
  if (isEventClientError(error)) {
    console.error(`${error.code}: ${error.message}`);
  } else {
    console.error("Fatal error:", error);
  }
  process.exitCode = 1;
});
