/** A parsed CSS color */
export interface RGBA {
  /** 6-char uppercase hex, no '#' */
  hex: string;
  /** 0 – 1 */
  alpha: number;
}

function toHex(channels: number[]): string {
  return channels
    .map((v) => Math.max(0, Math.min(255, Math.round(v))).toString(16).padStart(2, "0"))
    .join("")
    .toUpperCase();
}

/**
 * Parse a resolved CSS color (rgb/rgba/hex/transparent).
 * Returns undefined if unparseable.
 */
export function parseCssColor(color: string | undefined): RGBA | undefined {
  if (!color) return undefined;
  const value = color.trim().toLowerCase();
  if (value === "transparent") return { hex: "000000", alpha: 0 };

  if (value.startsWith("#")) {
    const hex = value.slice(1);
    if (!/^[0-9a-f]+$/.test(hex)) return undefined;
    if (hex.length === 3 || hex.length === 4) {
      const expanded = hex
        .split("")
        .map((c) => c + c)
        .join("");
      const alpha = hex.length === 4 ? parseInt(expanded.slice(6, 8), 16) / 255 : 1;
      return { hex: expanded.slice(0, 6).toUpperCase(), alpha };
    }
    if (hex.length === 6 || hex.length === 8) {
      const alpha = hex.length === 8 ? parseInt(hex.slice(6, 8), 16) / 255 : 1;
      return { hex: hex.slice(0, 6).toUpperCase(), alpha };
    }
    return undefined;
  }

  // rgb(r, g, b) / rgba(r, g, b, a), comma or space separated
  const match = value.match(
    /^rgba?\(\s*([\d.]+)[\s,]+([\d.]+)[\s,]+([\d.]+)(?:\s*[,/]\s*([\d.]+%?))?\s*\)$/
  );
  if (!match) return undefined;
  const channels = [match[1], match[2], match[3]].map((c) => parseFloat(c ?? "0"));
  let alpha = 1;
  const rawAlpha = match[4];
  if (rawAlpha !== undefined) {
    alpha = rawAlpha.endsWith("%")
      ? parseFloat(rawAlpha) / 100
      : parseFloat(rawAlpha);
  }
  return { hex: toHex(channels), alpha };
}

/** Hex of a visible color, or undefined if transparent/unparseable */
export function cssColorToHex(color: string | undefined): string | undefined {
  const parsed = parseCssColor(color);
  if (!parsed || parsed.alpha === 0) return undefined;
  return parsed.hex;
}

export function isGradient(backgroundImage: string | undefined): boolean {
  return backgroundImage !== undefined && /gradient\(/i.test(backgroundImage);
}

/**
 * Source of a bitmap background: the first `url(...)` of a resolved
 * background-image. Undefined for none, and for gradients.
 */
export function backgroundImageUrl(backgroundImage: string | undefined): string | undefined {
  if (!backgroundImage || isGradient(backgroundImage)) return undefined;
  const m = backgroundImage.match(/url\(\s*(["']?)(.*?)\1\s*\)/i);
  const url = m?.[2]?.trim();
  return url ? url : undefined;
}
