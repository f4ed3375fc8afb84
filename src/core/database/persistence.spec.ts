import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { createTestDataSource } from '../../testing/test-data-source';
import { User } from '../../modules/accounts/entities/user.entity';
import { UserService } from '../../modules/accounts/services/user.service';
import { Like } from '../../modules/likes/entities/like.entity';
import { LikeService } from '../../modules/likes/services/like.service';
import { Tweet } from '../../modules/tweets/entities/tweet.entity';
import { TweetPhoto } from '../../modules/tweets/entities/tweet-photo.entity';
import { TweetService } from '../../modules/tweets/services/tweet.service';
import { TweetPhotoService } from '../../modules/tweets/services/tweet-photo.service';

describe('Tweet storage', () => {
  let dataSource: DataSource;
  let userService: UserService;
  let tweetService: TweetService;
  let photoService: TweetPhotoService;
  let tweetRepository: Repository<Tweet>;
  let photoRepository: Repository<TweetPhoto>;
  let alice: User;
  let bob: User;

  beforeEach(async () => {
    dataSource = await createTestDataSource({ synchronize: true });
    tweetRepository = dataSource.getRepository(Tweet);
    photoRepository = dataSource.getRepository(TweetPhoto);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UserService,
        LikeService,
        TweetService,
        TweetPhotoService,
        {
          provide: getRepositoryToken(User),
          useValue: dataSource.getRepository(User),
        },
        {
          provide: getRepositoryToken(Like),
          useValue: dataSource.getRepository(Like),
        },
        {
          provide: getRepositoryToken(Tweet),
          useValue: tweetRepository,
        },
        {
          provide: getRepositoryToken(TweetPhoto),
          useValue: photoRepository,
        },
      ],
    }).compile();

    userService = module.get<UserService>(UserService);
    tweetService = module.get<TweetService>(TweetService);
    photoService = module.get<TweetPhotoService>(TweetPhotoService);

    const users = dataSource.getRepository(User);
    alice = await users.save(users.create({ username: 'alice' }));
    bob = await users.save(users.create({ username: 'bob' }));
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('should print the author of a tweet read back from storage', async () => {
    const created = await tweetService.createTweet({
      userId: alice.id,
      content: 'hello',
    });

    const found = await tweetService.getTweet(created.id);
    const [listed] = await tweetService.listTweets();
    const [latest] = await tweetService.listLatestByUser(alice.id);

    expect(found?.toString()).toBe(
      `${found?.createdAt.toISOString()} alice: hello`,
    );
    expect(listed.toString()).toBe(
      `${listed.createdAt.toISOString()} alice: hello`,
    );
    expect(latest.toString()).toBe(
      `${latest.createdAt.toISOString()} alice: hello`,
    );
  });

  it('should group unordered tweets by author, newest first', async () => {
    const postAt = (author: User, content: string, createdAt: string) =>
      tweetRepository.save(
        tweetRepository.create({
          userId: author.id,
          content,
          createdAt: new Date(createdAt),
        }),
      );
    await postAt(bob, 'bob first', '2026-10-19T08:00:00Z');
    await postAt(alice, 'alice first', '2026-10-19T09:00:00Z');
    await postAt(bob, 'bob second', '2026-10-19T10:00:00Z');
    await postAt(alice, 'alice second', '2026-10-19T11:00:00Z');

    const tweets = await tweetService.listTweets();

    const contentByAuthor = new Map<string, string[]>([
      [alice.id, ['alice second', 'alice first']],
      [bob.id, ['bob second', 'bob first']],
    ]);
    const authorIds = [alice.id, bob.id].sort((a, b) => (a < b ? -1 : 1));
    expect(tweets.map(t => t.content)).toEqual(
      authorIds.flatMap(id => contentByAuthor.get(id) ?? []),
    );
  });

  it('should keep tweets and photos when their author is removed', async () => {
    const tweet = await tweetService.createTweet({
      userId: alice.id,
      content: 'kept',
    });
    const photo = await photoService.attachPhoto({
      tweetId: tweet.id,
      file: 'tweet-photos/kept.jpg',
    });

    await userService.removeUser(alice.id);

    const storedTweet = await tweetRepository.findOneBy({ id: tweet.id });
    const storedPhoto = await photoRepository.findOneBy({ id: photo.id });
    expect(storedTweet?.userId).toBeNull();
    expect(storedTweet?.content).toBe('kept');
    expect(storedPhoto?.userId).toBeNull();
    expect(storedPhoto?.tweetId).toBe(tweet.id);

    const reread = await tweetService.getTweet(tweet.id);
    expect(reread?.toString()).toBe(
      `${reread?.createdAt.toISOString()} None: kept`,
    );
  });

  it('should store new photos with their defaults', async () => {
    const tweet = await tweetService.createTweet({
      userId: bob.id,
      content: 'with photo',
    });
    const photo = await photoService.attachPhoto({
      tweetId: tweet.id,
      file: 'tweet-photos/new.jpg',
    });

    const stored = await photoRepository.findOneBy({ id: photo.id });

    expect(stored?.order).toBe(0);
    expect(stored?.status).toBe(0);
    expect(stored?.hasDeleted).toBe(false);
    expect(stored?.deletedAt).toBeNull();
    expect(stored?.userId).toBe(bob.id);
  });

  it('should hide soft-deleted photos from their tweet', async () => {
    const tweet = await tweetService.createTweet({
      userId: bob.id,
      content: 'album',
    });
    const photo = await photoService.attachPhoto({
      tweetId: tweet.id,
      file: 'tweet-photos/gone.jpg',
    });

    await photoService.softDeletePhoto(photo.id);

    await expect(photoService.listPhotosForTweet(tweet.id)).resolves.toEqual(
      [],
    );
    const stored = await photoRepository.findOneBy({ id: photo.id });
    expect(stored?.hasDeleted).toBe(true);
    expect(stored?.deletedAt).toBeInstanceOf(Date);
  });

  it('should reject a deletion flag without a deletion time', async () => {
    const tweet = await tweetService.createTweet({
      userId: bob.id,
      content: 'checked',
    });

    await expect(
      photoRepository.insert({
        tweetId: tweet.id,
        file: 'tweet-photos/flagged.jpg',
        hasDeleted: true,
        deletedAt: null,
      }),
    ).rejects.toThrow();
  });
});
