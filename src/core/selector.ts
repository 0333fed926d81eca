export function pickRandom<T>(candidates: readonly T[], random: () => number = Math.random): T {
  if (candidates.length === 0) throw new RangeError("Cannot pick from an empty candidate list");

  const index = Math.min(Math.floor(random() * candidates.length), candidates.length - 1);
  return candidates[index];
}
