export const EMPTY_ADDRESS_DETAIL = "Empty address";

export type InvalidWalletAddressError = {
  kind: "InvalidWalletAddress";
  detail: string;
};

export type ZeroAmountError = {
  kind: "ZeroAmount";
};

export type NoTransactionsError = {
  kind: "NoTransactions";
  walletAddress: string;
};

export type BalanceError = InvalidWalletAddressError | ZeroAmountError | NoTransactionsError;

export type BalanceErrorKind = BalanceError["kind"];

export const invalidWalletAddress = (detail: string): InvalidWalletAddressError => ({
  kind: "InvalidWalletAddress",
  detail
});

export const zeroAmount = (): ZeroAmountError => ({ kind: "ZeroAmount" });

export const noTransactions = (walletAddress: string): NoTransactionsError => ({
  kind: "NoTransactions",
  walletAddress
});

export const describeBalanceError = (error: BalanceError): string => {
  switch (error.kind) {
    case "InvalidWalletAddress":
      return `Invalid wallet address: ${error.detail}`;
    case "ZeroAmount":
      return "Amount cannot be zero";
    case "NoTransactions":
      return `No transactions found for wallet ${error.walletAddress}`;
    default: {
      const unreachable: never = error;
      return unreachable;
    }
  }
};
