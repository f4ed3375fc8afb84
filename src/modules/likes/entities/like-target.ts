/**
 * Kinds of rows a Like can point at.
 */
export enum LikeTargetKind {
  TWEET = 'tweet',
  COMMENT = 'comment',
}

/**
 * Tagged reference to a liked row: the table it lives in plus its id.
 */
export interface LikeTarget {
  kind: LikeTargetKind;
  id: string;
}
