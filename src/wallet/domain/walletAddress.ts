export const WALLET_ADDRESS_MIN_LENGTH = 32;
export const WALLET_ADDRESS_MAX_LENGTH = 44;

// Base58 alphabet: no 0, I, O or l.
const WALLET_ADDRESS_REGEX = new RegExp(
  `^[1-9A-HJ-NP-Za-km-z]{${WALLET_ADDRESS_MIN_LENGTH},${WALLET_ADDRESS_MAX_LENGTH}}$`
);

/**
 * Lexical check only: a matching address is not guaranteed to exist on chain
 * or to decode to a valid public key.
 */
export const isValidWalletAddress = (address: string): boolean => {
  return WALLET_ADDRESS_REGEX.test(address);
};
