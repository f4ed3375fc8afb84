import { IsString, IsOptional, IsUUID, MaxLength } from 'class-validator';
import { TWEET_CONTENT_MAX_LENGTH } from '../entities/tweet.entity';

/**
 * Input for posting a tweet.
 */
export class CreateTweetDto {
  /**
   * Author of the tweet; null posts it without an author
   * @example "7f0c2a52-4b9e-4c55-9a3c-0f1d2b3c4d5e"
   */
  @IsOptional()
  @IsUUID()
  userId?: string | null;

  /**
   * @example "hello"
   */
  @IsString()
  @MaxLength(TWEET_CONTENT_MAX_LENGTH)
  content!: string;
}
