/**
 * Moderation state of an uploaded photo. Stored as a smallint.
 */
export enum TweetPhotoStatus {
  PENDING = 0,
  APPROVED = 1,
  REJECTED = 2,
}

export const TWEET_PHOTO_STATUS_VALUES: TweetPhotoStatus[] = [
  TweetPhotoStatus.PENDING,
  TweetPhotoStatus.APPROVED,
  TweetPhotoStatus.REJECTED,
];
