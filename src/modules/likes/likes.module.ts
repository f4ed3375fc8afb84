import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Like } from './entities/like.entity';
import { LikeService } from './services/like.service';

@Module({
  imports: [TypeOrmModule.forFeature([Like])],
  providers: [LikeService],
  exports: [LikeService],
})
export class LikesModule {}
