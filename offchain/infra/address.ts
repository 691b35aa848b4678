import { getAddress, type Address } from 'viem';
import { z } from 'zod';

export const EvmAddressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/)
  .transform((value): Address => getAddress(value));

export const Bytes32Schema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{64}$/)
  .transform((value): `0x${string}` => `0x${value.slice(2).toLowerCase()}`);

export function addressKey(address: string): string {
  return address.toLowerCase();
}
