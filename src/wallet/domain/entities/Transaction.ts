export type TransactionKind = "deposit" | "withdrawal";

/**
 * A single deposit or withdrawal against a wallet address.
 *
 * Amounts are signed integers in the smallest unit of the asset. Zero is
 * rejected by `calculateBalance`; negative amounts are taken as they are.
 */
export class Transaction {
  constructor(
    public readonly kind: TransactionKind,
    public readonly walletAddress: string,
    public readonly amount: bigint
  ) {
    Object.freeze(this);
  }

  static deposit(walletAddress: string, amount: bigint): Transaction {
    return new Transaction("deposit", walletAddress, amount);
  }

  static withdrawal(walletAddress: string, amount: bigint): Transaction {
    return new Transaction("withdrawal", walletAddress, amount);
  }
}
