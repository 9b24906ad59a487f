/**
 * Parses the optional seed argument; anything but an integer is rejected
 */
export function parseSeedArg(arg: string | undefined): number | undefined {
  if (arg === undefined || arg === '') return undefined;
  const seed = Number(arg);
  if (!Number.isInteger(seed)) {
    throw new Error(`Seed must be an integer, got "${arg}"`);
  }
  return seed;
}
