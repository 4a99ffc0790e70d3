export interface ListWindow {
  start: number;
  end: number;
}

/**
 * Visible slice `[start, end)` of a list with `total` rows in `height` lines,
 * keeping the selected row roughly centred once the list overflows.
 */
export function computeListWindow(selectedIndex: number, total: number, height: number): ListWindow {
  const visible = Math.max(0, Math.floor(height));
  if (total <= visible) return { start: 0, end: total };
  if (visible === 0) return { start: 0, end: 0 };

  const selected = Math.max(0, Math.min(selectedIndex, total - 1));
  const half = Math.floor(visible / 2);
  const start = Math.max(0, Math.min(selected - half, total - visible));
  return { start, end: start + visible };
}
