import * as cheerio from "cheerio";
import { cleanText, deriveItemId } from "./names.js";
import type { CollectionRef, ExtractedItem, ExtractedLeafRecord, SubCollectionRef } from "./types.js";

/**
 * Page readers turn a fully materialized page into typed rows. All knowledge
 * of the site's markup lives here.
 */
export interface PageView<T> {
  items: T[];
}

export interface PageReader<V extends PageView<unknown>> {
  readonly kind: "listing" | "detail" | "result";
  /** Elements counted while lazy loading. */
  readonly itemSelector: string;
  /** Toggle clicked once before loading, e.g. to reveal comments. */
  readonly expandSelector?: string;
  read(html: string, pageUrl: string): V;
}

export type ListingView = PageView<CollectionRef>;

export interface DetailView extends PageView<SubCollectionRef> {
  title: string | null;
}

export type ResultView = PageView<ExtractedItem>;

const COLLECTION_HREF = /\/l\/([a-f0-9]{32})\//;

function absolute(href: string, pageUrl: string) {
  return new URL(href, pageUrl).toString();
}

function collectionUrl(id: string, pageUrl: string) {
  return absolute(`/l/${id}/`, pageUrl);
}

export const listingReader: PageReader<ListingView> = {
  kind: "listing",
  itemSelector: 'a[href*="/l/"]',
  read(html, pageUrl) {
    const $ = cheerio.load(html);
    const items: CollectionRef[] = [];
    const seen = new Set<string>();

    $("a[href]").each((_, el) => {
      const match = ($(el).attr("href") ?? "").match(COLLECTION_HREF);
      if (!match) return;
      const id = match[1];
      const title = cleanText($(el).text());
      if (seen.has(id) || !title || title.toLowerCase().includes("create")) return;
      seen.add(id);
      items.push({ id, title, url: collectionUrl(id, pageUrl) });
    });

    return { items };
  }
};

export interface RoundHeading {
  sequenceNumber: number;
  title: string;
}

/**
 * "ROUND 3 Covers" → 3 / "Covers"; "B26.4 Deep Cuts" → 4 / "Deep Cuts";
 * anything else keeps the whole heading and the card's position.
 */
export function parseRoundHeading(text: string, position: number): RoundHeading {
  const heading = cleanText(text) ?? "";

  const round = heading.match(/ROUND\s*(\d+)/i);
  if (round) {
    const title = heading.replace(/^ROUND\s*\d+\s*/i, "").trim();
    return { sequenceNumber: Number.parseInt(round[1], 10), title: title || heading };
  }

  const prefixed = heading.match(/^[A-Z]*\d+\.(\d+)\s+(.+)/);
  if (prefixed) {
    return { sequenceNumber: Number.parseInt(prefixed[1], 10), title: prefixed[2].trim() };
  }

  return { sequenceNumber: position, title: heading || `Round ${position}` };
}

export function detailReader(collectionId: string): PageReader<DetailView> {
  const roundHref = new RegExp(`/l/${collectionId}/([a-f0-9]{32})/`);

  return {
    kind: "detail",
    itemSelector: "div.card",
    read(html, pageUrl) {
      const $ = cheerio.load(html);
      const items: SubCollectionRef[] = [];
      const seenIds = new Set<string>();
      const seenNumbers = new Set<number>();

      $("div.card").each((_, card) => {
        const $card = $(card);
        const link = $card
          .find("a[href]")
          .filter((_, a) => roundHref.test($(a).attr("href") ?? "") && /RESULTS/.test($(a).text()))
          .first();
        if (link.length === 0) return;

        const match = (link.attr("href") ?? "").match(roundHref);
        if (!match || seenIds.has(match[1])) return;
        const id = match[1];
        seenIds.add(id);

        const position = items.length + 1;
        const heading = parseRoundHeading($card.find("h5.card-title").first().text(), position);
        let sequenceNumber = seenNumbers.has(heading.sequenceNumber) ? position : heading.sequenceNumber;
        while (seenNumbers.has(sequenceNumber)) sequenceNumber += 1;
        seenNumbers.add(sequenceNumber);

        items.push({
          id,
          collectionId,
          sequenceNumber,
          title: heading.title,
          description: cleanText($card.find("p.card-text").first().text()),
          url: absolute(`/l/${collectionId}/${id}/`, pageUrl)
        });
      });

      return { title: cleanText($("h1").first().text()), items };
    }
  };
}

function parseInteger(text: string): number | null {
  const match = text.trim().match(/^-?\d+$/);
  return match ? Number.parseInt(match[0], 10) : null;
}

export const resultReader: PageReader<ResultView> = {
  kind: "result",
  itemSelector: "div.card",
  expandSelector: "button:has-text('Show comments')",
  read(html) {
    const $ = cheerio.load(html);
    const items: ExtractedItem[] = [];

    $("div.card").each((_, card) => {
      const $card = $(card);
      const trackLink = $card.find('a[href*="spotify.com/track"]').first();
      const votersLine = $card
        .find("p")
        .filter((_, p) => /\d+\s+voters?/.test($(p).text()))
        .first();
      if (trackLink.length === 0 || votersLine.length === 0) return;

      const title = cleanText(trackLink.text());
      if (!title) return;
      const sourceUrl = trackLink.attr("href") ?? null;

      let artist: string | null = null;
      let album: string | null = null;
      for (const p of $card.find("p.card-text").toArray()) {
        const text = cleanText($(p).text());
        if (!text || text.toLowerCase().includes("spotify")) continue;
        if ($(p).hasClass("text-body-secondary")) {
          album ??= text;
        } else {
          artist ??= text;
        }
      }

      const voterCount = Number.parseInt(votersLine.text().match(/(\d+)\s+voters?/)?.[1] ?? "0", 10);

      const submitter =
        cleanText($card.find('[class*="rank-"] .row .col').first().children().first().text()) ??
        cleanText($card.find('[class*="rank-"] .row .col').first().text());

      const submissionNote = cleanText($card.find(".card-body.bg-body-tertiary").first().text());

      const leafRecords: ExtractedLeafRecord[] = [];
      $card.find("div.card-footer.show div.row.align-items-start").each((_, row) => {
        const $row = $(row);
        const actor = cleanText($row.find("b").first().text());
        if (!actor) return;
        const points = cleanText($row.find("h6").first().text());
        const value = points == null ? null : parseInteger(points);
        const note = cleanText($row.find("span.text-break").first().text());
        leafRecords.push(
          points != null && value == null ? { actor, value, note, unreadableValue: points } : { actor, value, note }
        );
      });

      const awardedScore = leafRecords.reduce((sum, record) => sum + (record.value ?? 0), 0);
      const strike = $card.find("s.text-danger").first();
      const finalScore = strike.length ? penalizedScore(strike.text(), strike.parent().text()) : null;

      items.push({
        id: deriveItemId({ sourceUrl, title, artist }),
        title,
        primaryAttribute: artist,
        secondaryAttribute: album,
        submitter: submitter && !/^did not vote/i.test(submitter) ? submitter : null,
        submissionNote,
        awardedScore,
        aggregateScore: finalScore ?? awardedScore,
        voterCount,
        position: items.length + 1,
        sourceUrl,
        leafRecords
      });
    });

    return { items };
  }
};

/** A rule penalty shows as `<s class="text-danger">12</s>0`: the number after the strike is the final score. */
export function penalizedScore(struckText: string, containerText: string): number | null {
  const struck = struckText.trim();
  const at = containerText.indexOf(struck);
  if (!struck || at < 0) return null;
  const match = containerText.slice(at + struck.length).match(/-?\d+/);
  return match ? Number.parseInt(match[0], 10) : null;
}
