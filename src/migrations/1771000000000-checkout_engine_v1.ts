import { MigrationInterface, QueryRunner } from "typeorm";

export class CheckoutEngineV11771000000000 implements MigrationInterface {
    name = 'CheckoutEngineV11771000000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

        await queryRunner.query(`CREATE TABLE "customers" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "email" character varying(120) NOT NULL, "displayName" character varying(80), "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_customers_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "IDX_customers_email" ON "customers" ("email")`);

        await queryRunner.query(`CREATE TABLE "products" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "key" character varying(120) NOT NULL, "name" character varying(200) NOT NULL, "price" numeric(12,2) NOT NULL, "discountPercent" integer NOT NULL DEFAULT 0, "unitsInStock" integer NOT NULL DEFAULT 0, "isActive" boolean NOT NULL DEFAULT true, "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_products_id" PRIMARY KEY ("id"), CONSTRAINT "CHK_products_discount" CHECK ("discountPercent" BETWEEN 0 AND 100))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "IDX_products_key" ON "products" ("key")`);

        await queryRunner.query(`CREATE TYPE "public"."orders_status_enum" AS ENUM('OPEN', 'CHECKOUT', 'PAID', 'CANCELLED')`);
        await queryRunner.query(`CREATE TABLE "orders" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "customerId" uuid NOT NULL, "status" "public"."orders_status_enum" NOT NULL DEFAULT 'OPEN', "version" integer NOT NULL, "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "finalizedAt" TIMESTAMP WITH TIME ZONE, CONSTRAINT "PK_orders_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "IDX_orders_customer_open" ON "orders" ("customerId") WHERE "status" = 'OPEN'`);
        await queryRunner.query(`CREATE INDEX "IDX_orders_customer_created" ON "orders" ("customerId", "createdAt")`);
        await queryRunner.query(`ALTER TABLE "orders" ADD CONSTRAINT "FK_orders_customer" FOREIGN KEY ("customerId") REFERENCES "customers"("id") ON DELETE RESTRICT ON UPDATE NO ACTION`);

        await queryRunner.query(`CREATE TABLE "order_lines" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "orderId" uuid NOT NULL, "productId" uuid NOT NULL, "quantity" integer NOT NULL, "unitPrice" numeric(12,2) NOT NULL, "discountPercent" integer NOT NULL DEFAULT 0, "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_order_lines_id" PRIMARY KEY ("id"), CONSTRAINT "CHK_order_lines_quantity" CHECK ("quantity" > 0))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "IDX_order_lines_order_product" ON "order_lines" ("orderId", "productId")`);
        await queryRunner.query(`ALTER TABLE "order_lines" ADD CONSTRAINT "FK_order_lines_order" FOREIGN KEY ("orderId") REFERENCES "orders"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "order_lines" ADD CONSTRAINT "FK_order_lines_product" FOREIGN KEY ("productId") REFERENCES "products"("id") ON DELETE RESTRICT ON UPDATE NO ACTION`);

        await queryRunner.query(`CREATE TABLE "payment_methods" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "code" character varying(50) NOT NULL, "title" character varying(100) NOT NULL, "description" character varying(500) NOT NULL DEFAULT '', "imageUrl" character varying(500) NOT NULL DEFAULT '', "isActive" boolean NOT NULL DEFAULT true, "displayOrder" integer NOT NULL DEFAULT 0, "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_payment_methods_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "IDX_payment_methods_code" ON "payment_methods" ("code")`);
        await queryRunner.query(`INSERT INTO "payment_methods" ("code", "title", "description", "displayOrder") VALUES ('bank', 'Bank', 'Pay by bank transfer against a downloadable invoice', 1), ('terminal', 'Payment terminal', 'Pay at a self-service payment terminal', 2), ('card', 'Card', 'Pay online with a debit or credit card', 3)`);

        await queryRunner.query(`CREATE TYPE "public"."payment_transactions_status_enum" AS ENUM('PENDING', 'PROCESSING', 'COMPLETED', 'FAILED')`);
        await queryRunner.query(`CREATE TABLE "payment_transactions" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "orderId" uuid NOT NULL, "customerId" uuid NOT NULL, "paymentMethod" character varying(50) NOT NULL, "amount" numeric(12,2) NOT NULL, "status" "public"."payment_transactions_status_enum" NOT NULL DEFAULT 'PENDING', "processedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "externalTransactionId" character varying(128), "idempotencyKey" uuid, "errorMessage" character varying(500), CONSTRAINT "PK_payment_transactions_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "IDX_payment_transactions_idempotency_key" ON "payment_transactions" ("idempotencyKey")`);
        await queryRunner.query(`CREATE INDEX "IDX_payment_transactions_order" ON "payment_transactions" ("orderId", "processedAt")`);
        await queryRunner.query(`CREATE INDEX "IDX_payment_transactions_customer" ON "payment_transactions" ("customerId", "processedAt")`);
        await queryRunner.query(`ALTER TABLE "payment_transactions" ADD CONSTRAINT "FK_payment_transactions_order" FOREIGN KEY ("orderId") REFERENCES "orders"("id") ON DELETE RESTRICT ON UPDATE NO ACTION`);

        await queryRunner.query(`CREATE TABLE "event_logs" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "type" character varying(64) NOT NULL, "aggregateId" uuid, "payload" jsonb, "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_event_logs_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_event_logs_aggregate_created" ON "event_logs" ("aggregateId", "createdAt")`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP TABLE "event_logs"`);
        await queryRunner.query(`DROP TABLE "payment_transactions"`);
        await queryRunner.query(`DROP TYPE "public"."payment_transactions_status_enum"`);
        await queryRunner.query(`DROP TABLE "payment_methods"`);
        await queryRunner.query(`DROP TABLE "order_lines"`);
        await queryRunner.query(`DROP TABLE "orders"`);
        await queryRunner.query(`DROP TYPE "public"."orders_status_enum"`);
        await queryRunner.query(`DROP TABLE "products"`);
        await queryRunner.query(`DROP TABLE "customers"`);
    }

}
