import { Result, err, ok } from "neverthrow";
import { Transaction } from "../entities/Transaction";
import {
  BalanceError,
  EMPTY_ADDRESS_DETAIL,
  invalidWalletAddress,
  noTransactions,
  zeroAmount
} from "../errors/BalanceError";
import { isValidWalletAddress } from "../walletAddress";

const signedAmount = (transaction: Transaction): bigint => {
  return transaction.kind === "deposit" ? transaction.amount : -transaction.amount;
};

const transactionsFor = (
  walletAddress: string,
  transactions: readonly Transaction[]
): Transaction[] => {
  return transactions.filter((transaction) => transaction.walletAddress === walletAddress);
};

/**
 * Net balance of `walletAddress`: deposits minus withdrawals over the
 * transactions recorded for that address.
 *
 * Fails with `InvalidWalletAddress` for an empty or malformed address,
 * `NoTransactions` when `transactions` is empty (before filtering by address)
 * and `ZeroAmount` as soon as a matching transaction has a zero amount.
 */
export const calculateBalance = (
  walletAddress: string,
  transactions: readonly Transaction[]
): Result<bigint, BalanceError> => {
  if (walletAddress.length === 0) {
    return err(invalidWalletAddress(EMPTY_ADDRESS_DETAIL));
  }
  if (!isValidWalletAddress(walletAddress)) {
    return err(invalidWalletAddress(walletAddress));
  }
  if (transactions.length === 0) {
    return err(noTransactions(walletAddress));
  }
  return transactionsFor(walletAddress, transactions).reduce<Result<bigint, BalanceError>>(
    (result, transaction) =>
      result.andThen((balance): Result<bigint, BalanceError> =>
        transaction.amount === 0n ? err(zeroAmount()) : ok(balance + signedAmount(transaction))
      ),
    ok(0n)
  );
};

/**
 * Unchecked variant of `calculateBalance`. Performs no validation: any
 * address is accepted, an empty list sums to 0 and zero amounts are skipped.
 */
export const sumForWallet = (walletAddress: string, transactions: readonly Transaction[]): bigint => {
  return transactionsFor(walletAddress, transactions).reduce<bigint>(
    (balance, transaction) => balance + signedAmount(transaction),
    0n
  );
};
