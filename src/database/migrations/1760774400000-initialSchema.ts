import { MigrationInterface, QueryRunner } from 'typeorm';

export class initialSchema1760774400000 implements MigrationInterface {
  name = 'initialSchema1760774400000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);
    await queryRunner.query(
      `CREATE TABLE "user" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "username" character varying NOT NULL, "passwordHash" character varying NOT NULL, "role" character varying NOT NULL DEFAULT 'USER', "createdAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_78a916df40e02a9deb1c4b75edb" UNIQUE ("username"), CONSTRAINT "PK_cace4a159ff9f2512dd42373760" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE TABLE "menu_item" ("id" SERIAL NOT NULL, "name" character varying NOT NULL, "price" double precision NOT NULL, "rating" double precision NOT NULL DEFAULT '4', "category" character varying NOT NULL DEFAULT 'Main Course', "tags" text NOT NULL, "imageFile" character varying, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_722c4de0accbbfafc77947a8556" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_207bc726286bd9c968f90776e6" ON "menu_item" ("category") `,
    );
    await queryRunner.query(
      `CREATE TABLE "cart_item" ("id" SERIAL NOT NULL, "userId" character varying NOT NULL, "menuItemId" integer NOT NULL, "quantity" integer NOT NULL, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_f74f4c1366160fc5ea33ed3b01d" UNIQUE ("userId", "menuItemId"), CONSTRAINT "PK_bd94725aa84f8cf37632bcde997" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_158f0325ccf7f68a5b395fa2f6" ON "cart_item" ("userId") `,
    );
    await queryRunner.query(
      `CREATE TABLE "order" ("id" SERIAL NOT NULL, "userId" character varying, "customerName" character varying NOT NULL, "customerType" character varying NOT NULL, "totalAmount" double precision NOT NULL, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_1031171c13130102495201e3e20" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_caabe91507b3379c7ba73637b8" ON "order" ("userId") `,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_7bb07d3c6e225d75d8418380f1" ON "order" ("createdAt") `,
    );
    await queryRunner.query(
      `CREATE TABLE "order_item" ("id" SERIAL NOT NULL, "menuItemId" integer, "name" character varying NOT NULL, "price" double precision NOT NULL, "quantity" integer NOT NULL, "subTotal" double precision NOT NULL, "orderId" integer, CONSTRAINT "PK_d01158fe15b1ead5c26fd7f4e90" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `ALTER TABLE "cart_item" ADD CONSTRAINT "FK_8bc6d90b259c8ff564e7ffacc38" FOREIGN KEY ("menuItemId") REFERENCES "menu_item"("id") ON DELETE CASCADE ON UPDATE NO ACTION`,
    );
    await queryRunner.query(
      `ALTER TABLE "order_item" ADD CONSTRAINT "FK_646bf9ece6f45dbe41c203e06e0" FOREIGN KEY ("orderId") REFERENCES "order"("id") ON DELETE CASCADE ON UPDATE NO ACTION`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `ALTER TABLE "order_item" DROP CONSTRAINT "FK_646bf9ece6f45dbe41c203e06e0"`,
    );
    await queryRunner.query(
      `ALTER TABLE "cart_item" DROP CONSTRAINT "FK_8bc6d90b259c8ff564e7ffacc38"`,
    );
    await queryRunner.query(`DROP TABLE "order_item"`);
    await queryRunner.query(`DROP INDEX "IDX_7bb07d3c6e225d75d8418380f1"`);
    await queryRunner.query(`DROP INDEX "IDX_caabe91507b3379c7ba73637b8"`);
    await queryRunner.query(`DROP TABLE "order"`);
    await queryRunner.query(`DROP INDEX "IDX_158f0325ccf7f68a5b395fa2f6"`);
    await queryRunner.query(`DROP TABLE "cart_item"`);
    await queryRunner.query(`DROP INDEX "IDX_207bc726286bd9c968f90776e6"`);
    await queryRunner.query(`DROP TABLE "menu_item"`);
    await queryRunner.query(`DROP TABLE "user"`);
  }
}
