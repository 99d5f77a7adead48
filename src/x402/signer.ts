/**
 * EIP-712 signing of EIP-3009 `TransferWithAuthorization`.
 *
 * The domain separator and struct hash are computed explicitly so that every
 * step of the digest is inspectable:
 *
 *   digest = keccak256(0x19 ‖ 0x01 ‖ hashDomain(domain) ‖ hashStruct(message))
 *
 * The digest is then signed with the caller's secp256k1 key and the recovery
 * byte is normalized to the Ethereum convention (27/28).
 */

import { concat, encodeAbiParameters, isAddress, keccak256, numberToHex, toHex, type Address, type Hex } from 'viem';
import { privateKeyToAccount, sign } from 'viem/accounts';
import { SigningError, errorMessage } from '../errors.js';
import {
  CLOCK_SKEW_SECONDS,
  EIP3009_DOMAIN_TYPES,
  EIP3009_TYPES,
  type TokenDomain,
  type TransferWithAuthorization,
} from './eip3009.js';

type TypeField = { readonly name: string; readonly type: string };

function encodeType(primaryType: string, fields: readonly TypeField[]): string {
  return `${primaryType}(${fields.map((f) => `${f.type} ${f.name}`).join(',')})`;
}

export const DOMAIN_TYPE_HASH = keccak256(toHex(encodeType('EIP712Domain', EIP3009_DOMAIN_TYPES.EIP712Domain)));
export const TRANSFER_WITH_AUTHORIZATION_TYPE_HASH = keccak256(
  toHex(encodeType('TransferWithAuthorization', EIP3009_TYPES.TransferWithAuthorization)),
);

export type AuthorizationWindow = {
  validAfter: bigint;
  validBefore: bigint;
};

export function authorizationWindow(nowSeconds: number, maxTimeoutSeconds: number): AuthorizationWindow {
  const now = BigInt(Math.floor(nowSeconds));
  return {
    validAfter: now - BigInt(CLOCK_SKEW_SECONDS),
    validBefore: now + BigInt(maxTimeoutSeconds),
  };
}

export function toAddress(value: string, field: string): Address {
  // Address encoding is case-insensitive; lowercasing skips the EIP-55 checksum check.
  const lower = value.toLowerCase();
  if (!isAddress(lower)) {
    throw new SigningError(`invalid ${field} address`);
  }
  return lower;
}

export function parseAmount(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new SigningError(`invalid amount: ${JSON.stringify(value)} is not a base-10 integer`);
  }
  return BigInt(value);
}

export function hashDomain(domain: TokenDomain): Hex {
  return keccak256(
    encodeAbiParameters(
      [{ type: 'bytes32' }, { type: 'bytes32' }, { type: 'bytes32' }, { type: 'uint256' }, { type: 'address' }],
      [
        DOMAIN_TYPE_HASH,
        keccak256(toHex(domain.name)),
        keccak256(toHex(domain.version)),
        BigInt(domain.chainId),
        toAddress(domain.verifyingContract, 'verifyingContract'),
      ],
    ),
  );
}

export function hashTransferAuthorization(message: TransferWithAuthorization): Hex {
  return keccak256(
    encodeAbiParameters(
      [
        { type: 'bytes32' },
        { type: 'address' },
        { type: 'address' },
        { type: 'uint256' },
        { type: 'uint256' },
        { type: 'uint256' },
        { type: 'bytes32' },
      ],
      [
        TRANSFER_WITH_AUTHORIZATION_TYPE_HASH,
        toAddress(message.from, 'from'),
        toAddress(message.to, 'to'),
        message.value,
        message.validAfter,
        message.validBefore,
        message.nonce,
      ],
    ),
  );
}

export function typedDataDigest(domainHash: Hex, messageHash: Hex): Hex {
  return keccak256(concat(['0x1901', domainHash, messageHash]));
}

export function signerAddress(privateKey: Hex): Address {
  return privateKeyToAccount(privateKey).address;
}

export type SignTransferInput = {
  privateKey: Hex;
  to: string;
  value: string;
  validAfter: bigint;
  validBefore: bigint;
  nonce: Hex;
  domain: TokenDomain;
};

export type SignedTransfer = {
  signature: Hex;
  authorization: TransferWithAuthorization;
  digest: Hex;
};

export async function signTransferAuthorization(input: SignTransferInput): Promise<SignedTransfer> {
  const authorization: TransferWithAuthorization = {
    from: signerAddress(input.privateKey),
    to: toAddress(input.to, 'recipient'),
    value: parseAmount(input.value),
    validAfter: input.validAfter,
    validBefore: input.validBefore,
    nonce: input.nonce,
  };

  const digest = typedDataDigest(hashDomain(input.domain), hashTransferAuthorization(authorization));

  const raw = await sign({ hash: digest, privateKey: input.privateKey }).catch((err: unknown) => {
    throw new SigningError(`failed to sign authorization: ${errorMessage(err)}`, { cause: err });
  });

  const recovery = raw.yParity ?? Number(raw.v ?? 0n);
  const v = recovery < 27 ? recovery + 27 : recovery;
  const signature = concat([raw.r, raw.s, numberToHex(v, { size: 1 })]);

  return { signature, authorization, digest };
}
