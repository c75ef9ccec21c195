import type { TokenTransferEvent } from "../domain/TokenTransferEvent";
import { describeAccounts } from "../request/event-request";
import { formatTokenTransferEvent } from "../format";
import type { EventSink, EventSinkContext, EventSinkMeta } from "./event-sink";

export class ConsoleSink implements EventSink<TokenTransferEvent> {
  constructor(private readonly prefix = "EventSink") {}

  open(meta?: EventSinkMeta): void {
    const range = meta?.request
      ? ` ledgers ${meta.request.startLedger}-${meta.request.endLedger} for ${describeAccounts(meta.request)}`
      : "";
    console.info(`${this.prefix} opened${range}`);
  }

  write(event: TokenTransferEvent, ctx: EventSinkContext): void {
    console.info(`${this.prefix} #${ctx.index}\n${formatTokenTransferEvent(event)}`);
  }

  close(err?: unknown): void {
    if (err) console.warn(`${this.prefix} closing with error`, err);
    else console.info(`${this.prefix} closed`);
  }
}
