/** One slice of the identifier index, consumed once by the coordinator. */
export interface Page {
  /** Identifiers in index order. Length is at most the requested page size. */
  readonly identifiers: readonly string[];
  /** `true` when the index reports records beyond this page. */
  readonly hasMore: boolean;
}

/** An identifier paired with the sequence number it was dispatched under. */
export interface GroupMember {
  readonly sequence: number;
  readonly identifier: string;
}
