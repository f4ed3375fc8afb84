import {
  IsString,
  IsOptional,
  IsUUID,
  IsInt,
  IsNotEmpty,
  MaxLength,
  Min,
} from 'class-validator';
import { TWEET_PHOTO_FILE_MAX_LENGTH } from '../entities/tweet-photo.entity';

/**
 * Input for attaching an uploaded photo to a tweet.
 */
export class CreateTweetPhotoDto {
  @IsUUID()
  tweetId!: string;

  /**
   * Storage key returned by the upload service
   * @example "tweet-photos/2026/10/19/a1b2c3.jpg"
   */
  @IsString()
  @IsNotEmpty()
  @MaxLength(TWEET_PHOTO_FILE_MAX_LENGTH)
  file!: string;

  /**
   * Position among the tweet's photos
   * @example 0
   */
  @IsOptional()
  @IsInt()
  @Min(0)
  order?: number;

  /**
   * Uploader; defaults to the tweet's author
   */
  @IsOptional()
  @IsUUID()
  userId?: string;
}
