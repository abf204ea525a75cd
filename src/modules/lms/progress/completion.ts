/** floor(completadas * 100 / total), acotado a [0, 100]. Sin lecciones obligatorias da 0. */
export function computeCompletionPercentage(completed: number, total: number) {
  if (total <= 0) return 0;
  return Math.min(100, Math.floor((completed * 100) / total));
}
