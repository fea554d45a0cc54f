export const ADDRESS_BITS = 64;
export const MAX_ADDRESS = (1n << BigInt(ADDRESS_BITS)) - 1n;

/** widest set index that still fits a JS number exactly */
export const MAX_SET_INDEX_BITS = 53;

export type DecodedAddress = {
  tag: bigint;
  setIndex: number;
};

/**
 * Split an address into tag and set index
 *
 * ```
 * | tag (64 - s - b) | set index (s) | block offset (b) |
 * ```
 *
 * `s + b` must not exceed {@link ADDRESS_BITS}; callers validate the geometry.
 *
 * @throws RangeError when `s` exceeds {@link MAX_SET_INDEX_BITS}
 */
export function decode(
  address: bigint,
  setIndexBits: number,
  blockOffsetBits: number
): DecodedAddress {
  if (setIndexBits > MAX_SET_INDEX_BITS) {
    throw new RangeError(
      `${setIndexBits} set index bits do not fit a number, max ${MAX_SET_INDEX_BITS}`
    );
  }
  const consumed = setIndexBits + blockOffsetBits;

  const setIndex =
    setIndexBits === 0
      ? 0
      : Number(
          (address >> BigInt(blockOffsetBits)) &
            ((1n << BigInt(setIndexBits)) - 1n)
        );

  // full-width shift: nothing left for the tag
  const tag = consumed >= ADDRESS_BITS ? 0n : address >> BigInt(consumed);

  return { tag, setIndex };
}
