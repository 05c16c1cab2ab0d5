/**
 * Split a non-negative integer total across weighted slots.
 *
 * Each slot gets the floor of its proportional share; the leftover units go to
 * slots in descending order of their dropped fraction, lower index first on ties.
 * Slots with a non-positive or non-finite weight get 0. The result always sums
 * to `floor(total)` when at least one weight is positive.
 */
export function distributeInteger(total: number, weights: readonly number[]): number[] {
  const shares = weights.map(() => 0);
  const target = Number.isFinite(total) ? Math.max(0, Math.floor(total)) : 0;
  if (target === 0 || weights.length === 0) return shares;

  const usable = weights.map((w) => (Number.isFinite(w) && w > 0 ? w : 0));
  const weightSum = usable.reduce((sum, w) => sum + w, 0);
  if (weightSum <= 0) return shares;

  const remainders: Array<{ slot: number; frac: number }> = [];
  let assigned = 0;
  usable.forEach((w, slot) => {
    if (w === 0) return;
    const exact = (target * w) / weightSum;
    const base = Math.floor(exact);
    shares[slot] = base;
    assigned += base;
    remainders.push({ slot, frac: exact - base });
  });

  remainders.sort((a, b) => (b.frac !== a.frac ? b.frac - a.frac : a.slot - b.slot));
  let left = target - assigned;
  for (const { slot } of remainders) {
    if (left <= 0) break;
    shares[slot] = (shares[slot] ?? 0) + 1;
    left--;
  }
  return shares;
}
