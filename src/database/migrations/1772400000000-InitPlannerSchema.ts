import type { MigrationInterface, QueryRunner } from 'typeorm';

export class InitPlannerSchema1772400000000 implements MigrationInterface {
  name = 'InitPlannerSchema1772400000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `CREATE TYPE "learners_diagnostic_category_enum" AS ENUM('typical', 'support_need_a', 'support_need_b', 'high_capability', 'dual_exceptionality')`,
    );
    await queryRunner.query(
      `CREATE TYPE "learners_channel_enum" AS ENUM('visual', 'auditory', 'kinesthetic', 'reading_writing', 'multisensory')`,
    );
    await queryRunner.query(`CREATE TYPE "behavior_level_enum" AS ENUM('low', 'medium', 'high')`);
    await queryRunner.query(
      `CREATE TABLE "classrooms" ("id" SERIAL NOT NULL, "name" character varying(120) NOT NULL, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_classrooms" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE TABLE "learners" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "name" character varying(120) NOT NULL, "diagnostic_category" "learners_diagnostic_category_enum" NOT NULL DEFAULT 'typical', "competencies" jsonb NOT NULL DEFAULT '{}'::jsonb, "preferred_channel" "learners_channel_enum" NOT NULL DEFAULT 'multisensory', "activity_level" "behavior_level_enum" NOT NULL DEFAULT 'medium', "frustration_tolerance" "behavior_level_enum" NOT NULL DEFAULT 'medium', "classroom_id" integer, CONSTRAINT "PK_learners" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `ALTER TABLE "learners" ADD CONSTRAINT "FK_learners_classroom" FOREIGN KEY ("classroom_id") REFERENCES "classrooms"("id") ON DELETE SET NULL ON UPDATE NO ACTION`,
    );
    await queryRunner.query(
      `CREATE TABLE "embedding_cache" ("content_hash" character(64) NOT NULL, "vector" jsonb NOT NULL, "source_key" character varying(255), "model" character varying(120) NOT NULL, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL, CONSTRAINT "PK_embedding_cache" PRIMARY KEY ("content_hash"))`,
    );
    await queryRunner.query(`CREATE INDEX "IDX_embedding_cache_source_key" ON "embedding_cache" ("source_key")`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "IDX_embedding_cache_source_key"`);
    await queryRunner.query(`DROP TABLE "embedding_cache"`);
    await queryRunner.query(`ALTER TABLE "learners" DROP CONSTRAINT "FK_learners_classroom"`);
    await queryRunner.query(`DROP TABLE "learners"`);
    await queryRunner.query(`DROP TABLE "classrooms"`);
    await queryRunner.query(`DROP TYPE "behavior_level_enum"`);
    await queryRunner.query(`DROP TYPE "learners_channel_enum"`);
    await queryRunner.query(`DROP TYPE "learners_diagnostic_category_enum"`);
  }
}
