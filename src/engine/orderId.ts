/**
 * Pool and order identifiers, matching the on-chain encodings:
 *   poolId  = keccak256(abi.encode(PoolKey))
 *   orderId = uint256(keccak256(abi.encode(poolId, int24 tick, bool zeroForOne)))
 */

import { encodeAbiParameters, hexToBigInt, keccak256, type Hex } from "viem";
import type { PoolKey } from "../types/pool.js";

export function toPoolId(key: PoolKey): Hex {
  return keccak256(
    encodeAbiParameters(
      [
        { name: "currency0", type: "address" },
        { name: "currency1", type: "address" },
        { name: "fee", type: "uint24" },
        { name: "tickSpacing", type: "int24" },
        { name: "hooks", type: "address" },
      ],
      [key.currency0, key.currency1, key.fee, key.tickSpacing, key.hooks]
    )
  );
}

/**
 * Id of the claim units for one (pool, tick, direction) bucket.
 * `tick` is used as given; callers pass the lower usable tick.
 */
export function getOrderId(key: PoolKey, tick: number, zeroForOne: boolean): bigint {
  return hexToBigInt(
    keccak256(
      encodeAbiParameters(
        [
          { name: "poolId", type: "bytes32" },
          { name: "tick", type: "int24" },
          { name: "zeroForOne", type: "bool" },
        ],
        [toPoolId(key), tick, zeroForOne]
      )
    )
  );
}
