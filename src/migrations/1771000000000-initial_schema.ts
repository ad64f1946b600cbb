import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialSchema1771000000000 implements MigrationInterface {
  name = 'InitialSchema1771000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    // Users
    await queryRunner.query(
      `CREATE TABLE "users" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name" character varying(64) NOT NULL,
        "email" character varying(254) NOT NULL,
        "passwordHash" character varying(100) NOT NULL,
        "admin" boolean NOT NULL DEFAULT false,
        "joinDate" date NOT NULL,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users" PRIMARY KEY ("id")
      )`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_users_name" ON "users" ("name")`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_users_email" ON "users" ("email")`,
    );

    // Leagues
    await queryRunner.query(
      `CREATE TABLE "leagues" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name" character varying(255) NOT NULL,
        "creatorId" uuid NOT NULL,
        "creationDate" date NOT NULL,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_leagues" PRIMARY KEY ("id"),
        CONSTRAINT "FK_leagues_creatorId" FOREIGN KEY ("creatorId")
          REFERENCES "users"("id") ON DELETE CASCADE
      )`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_leagues_name" ON "leagues" ("name")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_leagues_creatorId" ON "leagues" ("creatorId")`,
    );

    // Memberships
    await queryRunner.query(
      `CREATE TABLE "league_memberships" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "leagueId" uuid NOT NULL,
        "userId" uuid NOT NULL,
        "moderator" boolean NOT NULL DEFAULT false,
        "owner" boolean NOT NULL DEFAULT false,
        "joinedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_league_memberships" PRIMARY KEY ("id"),
        CONSTRAINT "FK_league_memberships_leagueId" FOREIGN KEY ("leagueId")
          REFERENCES "leagues"("id") ON DELETE CASCADE,
        CONSTRAINT "FK_league_memberships_userId" FOREIGN KEY ("userId")
          REFERENCES "users"("id") ON DELETE CASCADE
      )`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_league_memberships_league_user" ON "league_memberships" ("leagueId", "userId")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_league_memberships_userId" ON "league_memberships" ("userId")`,
    );

    // Posts
    await queryRunner.query(
      `CREATE TABLE "league_posts" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "leagueId" uuid NOT NULL,
        "authorId" uuid NOT NULL,
        "title" character varying(140) NOT NULL,
        "body" character varying(1000) NOT NULL,
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_league_posts" PRIMARY KEY ("id"),
        CONSTRAINT "FK_league_posts_leagueId" FOREIGN KEY ("leagueId")
          REFERENCES "leagues"("id") ON DELETE CASCADE,
        CONSTRAINT "FK_league_posts_authorId" FOREIGN KEY ("authorId")
          REFERENCES "users"("id") ON DELETE CASCADE
      )`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_league_posts_league_created" ON "league_posts" ("leagueId", "createdAt")`,
    );

    // Events and stages
    await queryRunner.query(
      `CREATE TABLE "events" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name" character varying(255) NOT NULL,
        "leagueId" uuid NOT NULL,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_events" PRIMARY KEY ("id"),
        CONSTRAINT "FK_events_leagueId" FOREIGN KEY ("leagueId")
          REFERENCES "leagues"("id") ON DELETE CASCADE
      )`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_events_leagueId" ON "events" ("leagueId")`,
    );

    await queryRunner.query(
      `CREATE TABLE "stages" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "eventId" uuid NOT NULL,
        "startDate" date NOT NULL,
        "endDate" date NOT NULL,
        CONSTRAINT "PK_stages" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_stages_date_range" CHECK ("startDate" <= "endDate"),
        CONSTRAINT "FK_stages_eventId" FOREIGN KEY ("eventId")
          REFERENCES "events"("id") ON DELETE CASCADE
      )`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_stages_eventId" ON "stages" ("eventId")`,
    );

    // Participants
    await queryRunner.query(
      `CREATE TABLE "participants" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "eventId" uuid NOT NULL,
        "userId" uuid NOT NULL,
        "enrolledAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_participants" PRIMARY KEY ("id"),
        CONSTRAINT "FK_participants_eventId" FOREIGN KEY ("eventId")
          REFERENCES "events"("id") ON DELETE CASCADE,
        CONSTRAINT "FK_participants_userId" FOREIGN KEY ("userId")
          REFERENCES "users"("id") ON DELETE CASCADE
      )`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_participants_event_user" ON "participants" ("eventId", "userId")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_participants_userId" ON "participants" ("userId")`,
    );

    // Matches
    await queryRunner.query(
      `CREATE TABLE "matches" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "stageId" uuid NOT NULL,
        "participant1Id" uuid NOT NULL,
        "participant2Id" uuid NOT NULL,
        "winnerId" uuid,
        "loserId" uuid,
        "p1Wins" integer,
        "p2Wins" integer,
        "draws" integer,
        "recordedAt" TIMESTAMP WITH TIME ZONE,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_matches" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_matches_distinct_participants" CHECK ("participant1Id" <> "participant2Id"),
        CONSTRAINT "FK_matches_stageId" FOREIGN KEY ("stageId")
          REFERENCES "stages"("id") ON DELETE CASCADE,
        CONSTRAINT "FK_matches_participant1Id" FOREIGN KEY ("participant1Id")
          REFERENCES "participants"("id") ON DELETE CASCADE,
        CONSTRAINT "FK_matches_participant2Id" FOREIGN KEY ("participant2Id")
          REFERENCES "participants"("id") ON DELETE CASCADE
      )`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_matches_stageId" ON "matches" ("stageId")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_matches_participant1Id" ON "matches" ("participant1Id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_matches_participant2Id" ON "matches" ("participant2Id")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "matches"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "participants"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "stages"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "events"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "league_posts"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "league_memberships"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "leagues"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);
  }
}
