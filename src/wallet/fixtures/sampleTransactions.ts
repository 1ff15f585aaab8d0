import { Transaction } from "../domain/entities/Transaction";

export const ALICE_ADDRESS = "ALiCEqZUF4VYuxTu1UQvzDqbpGYYFrxH6kQxWFB8Nqp3";
// Contains an "O", so only the unchecked sum accepts it.
export const BOB_ADDRESS = "BOBqZUF4VYuxTu1UQvzDqbpGYYFrxH6kQxWFB8Nqp3";

export const sampleTransactions: readonly Transaction[] = [
  Transaction.deposit(ALICE_ADDRESS, 100n),
  Transaction.withdrawal(ALICE_ADDRESS, 50n),
  Transaction.deposit(BOB_ADDRESS, 200n),
  Transaction.withdrawal(BOB_ADDRESS, 75n),
  Transaction.deposit(ALICE_ADDRESS, 25n)
];
