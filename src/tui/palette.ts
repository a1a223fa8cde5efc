export const PALETTE = {
  fg: "white",
  bg: "black",
  accent: "cyan",
  focus: "green",
  muted: "gray",
  error: "red",
} as const;
