import { createHash } from "node:crypto";

export function slugifyName(value: string) {
  if (!value) return "";
  const ascii = value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^\x00-\x7F]/g, "");
  return ascii
    .replace(/[^a-zA-Z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .toLowerCase();
}

/** Collapses runs of whitespace; blank input comes back as null. */
export function cleanText(value: string | null | undefined): string | null {
  if (value == null) return null;
  const text = value.replace(/\r|\n/g, " ").replace(/\t/g, " ").replace(/\s+/g, " ").trim();
  return text || null;
}

/**
 * Plain ASCII names map to their slug. Anything else also carries a short hash of
 * the full name, since slugifying drops the characters that tell "李 Lee" from "王 Lee".
 */
export function actorHandle(displayName: string): string {
  const name = displayName.trim();
  const slug = slugifyName(name);
  if (slug && /^[\x00-\x7F]*$/.test(name)) return slug;
  const digest = createHash("sha256").update(name).digest("hex").slice(0, 8);
  return `${slug || "member"}-${digest}`;
}

export function deriveItemId({
  sourceUrl,
  title,
  artist
}: {
  sourceUrl: string | null;
  title: string;
  artist: string | null;
}) {
  const track = sourceUrl?.match(/\/track\/([A-Za-z0-9]+)/);
  if (track) return track[1];
  const slug = slugifyName([title, artist].filter(Boolean).join(" "));
  return slug || `item-${Buffer.from(title).toString("hex").slice(0, 24)}`;
}
