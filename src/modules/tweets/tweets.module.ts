import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Tweet } from './entities/tweet.entity';
import { TweetPhoto } from './entities/tweet-photo.entity';
import { TweetService } from './services/tweet.service';
import { TweetPhotoService } from './services/tweet-photo.service';
import { AccountsModule } from '../accounts/accounts.module';
import { LikesModule } from '../likes/likes.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([Tweet, TweetPhoto]),
    AccountsModule,
    LikesModule,
  ],
  providers: [TweetService, TweetPhotoService],
  exports: [TweetService, TweetPhotoService],
})
export class TweetsModule {}
