export const CHART_WIDTH = 900;
export const CHART_HEIGHT = 380;
export const CHART_MARGIN = { top: 16, right: 24, bottom: 32, left: 24 };

export const AXIS_TICK = { fontSize: 11, fill: "rgba(75, 85, 99, 0.9)" };

export const COLORS = {
  observed: "#111827",
  forecast: "#2563eb",
  band: "#93c5fd",
  early: "#2563eb",
  late: "#16a34a",
  fit: "#dc2626",
  diff: "#0f766e",
  zero: "#dc2626",
};

export function formatYearTick(t: number): string {
  return String(new Date(t).getUTCFullYear());
}

/** Evenly spread hues so consecutive years stay distinguishable. */
export function yearColor(index: number, total: number): string {
  const hue = Math.round((index / Math.max(total, 1)) * 300);
  return `hsl(${hue}, 65%, 45%)`;
}
