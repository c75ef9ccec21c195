import type { TokenTransferEvent } from "../domain/TokenTransferEvent";
import type { TokenTransferEventStream } from "../event-stream";
import type { EventSink, EventSinkMeta } from "./event-sink";

/**
 * Drain a stream into a sink. The sink is closed with the failure, if any,
 * and the failure is rethrown. Resolves with the number of events written.
 */
export async function pipeToSink(
  stream: TokenTransferEventStream,
  sink: EventSink<TokenTransferEvent>,
  meta: EventSinkMeta = {},
): Promise<number> {
  await sink.open?.({ request: stream.request, ...meta });
  let index = 0;
  try {
    for await (const event of stream) {
      await sink.write(event, { index });
      index += 1;
    }
  } catch (err) {
    await sink.close?.(err);
    throw err;
  }
  await sink.close?.();
  return index;
}
