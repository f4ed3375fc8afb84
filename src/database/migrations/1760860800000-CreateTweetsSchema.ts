import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateTweetsSchema1760860800000 implements MigrationInterface {
  name = 'CreateTweetsSchema1760860800000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `CREATE TABLE "users" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "username" character varying(150) NOT NULL, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_a3ffb1c0c8416b9fc6f907b7433" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_fe0bb3f6520ee0469504521e71" ON "users" ("username") `,
    );
    await queryRunner.query(
      `CREATE TABLE "tweets" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "user_id" uuid, "content" character varying(255) NOT NULL, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_19d841599ad812c558807aec76c" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_cd9744d0128ddc0b8f7d2a25ac" ON "tweets" ("user_id", "created_at") `,
    );
    await queryRunner.query(
      `CREATE TABLE "tweet_photos" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "tweet_id" uuid, "user_id" uuid, "file" character varying(1024) NOT NULL, "order" integer NOT NULL DEFAULT '0', "status" smallint NOT NULL DEFAULT '0', "has_deleted" boolean NOT NULL DEFAULT false, "deleted_at" TIMESTAMP WITH TIME ZONE, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "CHK_tweet_photos_status" CHECK ("status" IN (0, 1, 2)), CONSTRAINT "CHK_tweet_photos_deleted_at" CHECK (("has_deleted" = false AND "deleted_at" IS NULL) OR ("has_deleted" = true AND "deleted_at" IS NOT NULL)), CONSTRAINT "PK_432a882c0771daceeea0951e011" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_5598623d4e9e425e3ff6e1ebf9" ON "tweet_photos" ("user_id", "created_at") `,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_4ac468a83586fd8a02a88ec13e" ON "tweet_photos" ("has_deleted", "created_at") `,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_3ddabd13f2f9c1666826003aac" ON "tweet_photos" ("status", "created_at") `,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_4714646a40bd04fdafe6716511" ON "tweet_photos" ("tweet_id", "order") `,
    );
    await queryRunner.query(
      `CREATE TYPE "public"."likes_target_kind_enum" AS ENUM('tweet', 'comment')`,
    );
    await queryRunner.query(
      `CREATE TABLE "likes" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "target_kind" "public"."likes_target_kind_enum" NOT NULL, "target_id" uuid NOT NULL, "user_id" uuid NOT NULL, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_a9323de3f8bced7539a794b4a37" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_8f6e23b805411eb1546b5ecedb" ON "likes" ("target_kind", "target_id", "created_at") `,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_39e823c0ba91bc592564ea148a" ON "likes" ("user_id", "target_kind", "target_id") `,
    );
    await queryRunner.query(
      `ALTER TABLE "tweets" ADD CONSTRAINT "FK_0a23c50228c2db732e3214682b0" FOREIGN KEY ("user_id") REFERENCES "users"("id") ON DELETE SET NULL ON UPDATE NO ACTION`,
    );
    await queryRunner.query(
      `ALTER TABLE "tweet_photos" ADD CONSTRAINT "FK_5c96e873c7edee6a1e26e085521" FOREIGN KEY ("tweet_id") REFERENCES "tweets"("id") ON DELETE SET NULL ON UPDATE NO ACTION`,
    );
    await queryRunner.query(
      `ALTER TABLE "tweet_photos" ADD CONSTRAINT "FK_23303d37467444f6f7f98ac18db" FOREIGN KEY ("user_id") REFERENCES "users"("id") ON DELETE SET NULL ON UPDATE NO ACTION`,
    );
    await queryRunner.query(
      `ALTER TABLE "likes" ADD CONSTRAINT "FK_3f519ed95f775c781a254089171" FOREIGN KEY ("user_id") REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `ALTER TABLE "likes" DROP CONSTRAINT "FK_3f519ed95f775c781a254089171"`,
    );
    await queryRunner.query(
      `ALTER TABLE "tweet_photos" DROP CONSTRAINT "FK_23303d37467444f6f7f98ac18db"`,
    );
    await queryRunner.query(
      `ALTER TABLE "tweet_photos" DROP CONSTRAINT "FK_5c96e873c7edee6a1e26e085521"`,
    );
    await queryRunner.query(
      `ALTER TABLE "tweets" DROP CONSTRAINT "FK_0a23c50228c2db732e3214682b0"`,
    );
    await queryRunner.query(
      `DROP INDEX "public"."IDX_39e823c0ba91bc592564ea148a"`,
    );
    await queryRunner.query(
      `DROP INDEX "public"."IDX_8f6e23b805411eb1546b5ecedb"`,
    );
    await queryRunner.query(`DROP TABLE "likes"`);
    await queryRunner.query(`DROP TYPE "public"."likes_target_kind_enum"`);
    await queryRunner.query(
      `DROP INDEX "public"."IDX_4714646a40bd04fdafe6716511"`,
    );
    await queryRunner.query(
      `DROP INDEX "public"."IDX_3ddabd13f2f9c1666826003aac"`,
    );
    await queryRunner.query(
      `DROP INDEX "public"."IDX_4ac468a83586fd8a02a88ec13e"`,
    );
    await queryRunner.query(
      `DROP INDEX "public"."IDX_5598623d4e9e425e3ff6e1ebf9"`,
    );
    await queryRunner.query(`DROP TABLE "tweet_photos"`);
    await queryRunner.query(
      `DROP INDEX "public"."IDX_cd9744d0128ddc0b8f7d2a25ac"`,
    );
    await queryRunner.query(`DROP TABLE "tweets"`);
    await queryRunner.query(
      `DROP INDEX "public"."IDX_fe0bb3f6520ee0469504521e71"`,
    );
    await queryRunner.query(`DROP TABLE "users"`);
  }
}
