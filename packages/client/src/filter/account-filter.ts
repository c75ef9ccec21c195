import type { TokenTransferEvent } from "../domain/TokenTransferEvent";

/**
 * Client-side account filter. An empty filter matches every event; otherwise an
 * event matches when its source or destination account is in the set.
 * Account ids compare exactly, with no case folding.
 */
export class AccountFilter {
  private readonly accounts: ReadonlySet<string>;

  private constructor(accounts: ReadonlySet<string>) {
    this.accounts = accounts;
  }

  static from(accountIds: readonly string[]): AccountFilter {
    return new AccountFilter(new Set(accountIds));
  }

  get isEmpty(): boolean {
    return this.accounts.size === 0;
  }

  matches(event: Pick<TokenTransferEvent, "from" | "to">): boolean {
    if (this.isEmpty) return true;
    return (
      (event.from !== undefined && this.accounts.has(event.from)) ||
      (event.to !== undefined && this.accounts.has(event.to))
    );
  }
}
