// Shapes read off the site, before persistence.

export interface CollectionRef {
  id: string;
  title: string;
  url: string;
}

export interface SubCollectionRef {
  id: string;
  collectionId: string;
  sequenceNumber: number;
  title: string;
  description: string | null;
  url: string;
}

export interface ExtractedLeafRecord {
  actor: string;
  value: number | null;
  note: string | null;
  /** Raw text of a points cell that is present but not a whole number. */
  unreadableValue?: string;
}

export interface ExtractedItem {
  id: string;
  title: string;
  primaryAttribute: string | null;
  secondaryAttribute: string | null;
  submitter: string | null;
  submissionNote: string | null;
  awardedScore: number;
  aggregateScore: number;
  voterCount: number;
  position: number;
  sourceUrl: string | null;
  leafRecords: ExtractedLeafRecord[];
}

// Rows as persisted.

export interface CollectionRow {
  id: string;
  title: string;
  sourceUrl: string;
}

export interface SubCollectionRow {
  id: string;
  collectionId: string;
  sequenceNumber: number;
  title: string;
  description: string | null;
  sourceUrl: string | null;
}

export interface ActorRow {
  handle: string;
  displayName: string;
}

export interface ItemRow {
  id: string;
  subCollectionId: string;
  title: string;
  primaryAttribute: string | null;
  secondaryAttribute: string | null;
  submitter: string | null;
  submissionNote: string | null;
  aggregateScore: number;
  awardedScore: number;
  voterCount: number;
  position: number;
  sourceUrl: string | null;
}

export interface LeafRecordRow {
  subCollectionId: string;
  itemId: string;
  actor: string;
  value: number | null;
  note: string | null;
}

/** Everything written for one round, committed as a unit. */
export interface SubCollectionBatch {
  subCollection: SubCollectionRow;
  actors: ActorRow[];
  items: ItemRow[];
  leafRecords: LeafRecordRow[];
}
