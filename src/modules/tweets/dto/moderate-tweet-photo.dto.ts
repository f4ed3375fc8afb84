import { IsIn } from 'class-validator';
import { TweetPhotoStatus } from '../entities/tweet-photo-status';

export class ModerateTweetPhotoDto {
  @IsIn([TweetPhotoStatus.APPROVED, TweetPhotoStatus.REJECTED])
  status!: TweetPhotoStatus.APPROVED | TweetPhotoStatus.REJECTED;
}
