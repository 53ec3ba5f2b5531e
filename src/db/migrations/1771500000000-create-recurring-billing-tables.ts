import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateRecurringBillingTables1771500000000 implements MigrationInterface {
  name = 'CreateRecurringBillingTables1771500000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS pgcrypto`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS recurring_invoices (
        id uuid NOT NULL DEFAULT gen_random_uuid(),
        customer_id uuid NOT NULL,
        template_id uuid,
        frequency varchar(20) NOT NULL,
        interval_value integer NOT NULL DEFAULT 1,
        start_date date NOT NULL,
        end_date date,
        max_occurrences integer,
        occurrences_generated integer NOT NULL DEFAULT 0,
        next_occurrence_date date NOT NULL,
        status varchar(20) NOT NULL DEFAULT 'active',
        line_items jsonb NOT NULL DEFAULT '[]',
        tax_rate numeric(5,2) NOT NULL DEFAULT 0,
        payment_terms varchar(50) NOT NULL DEFAULT 'Net 30',
        notes text,
        auto_send boolean NOT NULL DEFAULT false,
        metadata jsonb,
        last_attempt_at timestamptz,
        last_error text,
        failed_attempts integer NOT NULL DEFAULT 0,
        created_at timestamptz NOT NULL DEFAULT now(),
        updated_at timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT recurring_invoices_pkey PRIMARY KEY (id),
        CONSTRAINT chk_recurring_invoices_interval CHECK (interval_value >= 1),
        CONSTRAINT chk_recurring_invoices_max CHECK (max_occurrences IS NULL OR max_occurrences >= 1),
        CONSTRAINT chk_recurring_invoices_dates CHECK (end_date IS NULL OR end_date >= start_date)
      )
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_recurring_invoices_status_next_occurrence_date
      ON recurring_invoices (status, next_occurrence_date)
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_recurring_invoices_customer_id
      ON recurring_invoices (customer_id)
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS recurring_invoice_instances (
        id uuid NOT NULL DEFAULT gen_random_uuid(),
        recurring_invoice_id uuid NOT NULL,
        invoice_id uuid,
        occurrence_number integer NOT NULL,
        scheduled_date date NOT NULL,
        generated_at timestamptz,
        sent_at timestamptz,
        status varchar(20) NOT NULL DEFAULT 'scheduled',
        error_message text,
        created_at timestamptz NOT NULL DEFAULT now(),
        updated_at timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT recurring_invoice_instances_pkey PRIMARY KEY (id),
        CONSTRAINT fk_recurring_invoice_instances_definition FOREIGN KEY (recurring_invoice_id)
          REFERENCES recurring_invoices (id) ON DELETE CASCADE
      )
    `);
    await queryRunner.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS uq_recurring_invoice_instances_occurrence
      ON recurring_invoice_instances (recurring_invoice_id, occurrence_number)
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_recurring_invoice_instances_status
      ON recurring_invoice_instances (status)
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS invoices (
        id uuid NOT NULL DEFAULT gen_random_uuid(),
        invoice_number varchar(40) NOT NULL,
        customer_id uuid NOT NULL,
        recurring_instance_id uuid,
        title varchar(255),
        invoice_date date NOT NULL,
        due_date date,
        payment_terms varchar(50) NOT NULL DEFAULT 'Net 30',
        line_items jsonb NOT NULL DEFAULT '[]',
        subtotal numeric(12,2) NOT NULL DEFAULT 0,
        tax_rate numeric(5,2) NOT NULL DEFAULT 0,
        tax_amount numeric(12,2) NOT NULL DEFAULT 0,
        total_amount numeric(12,2) NOT NULL DEFAULT 0,
        amount_paid numeric(12,2) NOT NULL DEFAULT 0,
        balance_due numeric(12,2) NOT NULL DEFAULT 0,
        status varchar(20) NOT NULL DEFAULT 'draft',
        sent_at timestamptz,
        paid_date date,
        overdue_date date,
        notes text,
        created_at timestamptz NOT NULL DEFAULT now(),
        updated_at timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT invoices_pkey PRIMARY KEY (id),
        CONSTRAINT fk_invoices_recurring_instance FOREIGN KEY (recurring_instance_id)
          REFERENCES recurring_invoice_instances (id) ON DELETE SET NULL
      )
    `);
    await queryRunner.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_invoices_invoice_number ON invoices (invoice_number)
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_invoices_customer_id_invoice_date
      ON invoices (customer_id, invoice_date)
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_invoices_status_due_date ON invoices (status, due_date)
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_invoices_recurring_instance_id
      ON invoices (recurring_instance_id)
    `);
    await queryRunner.query(`
      ALTER TABLE recurring_invoice_instances
      ADD CONSTRAINT fk_recurring_invoice_instances_invoice FOREIGN KEY (invoice_id)
        REFERENCES invoices (id) ON DELETE SET NULL
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS payment_plans (
        id uuid NOT NULL DEFAULT gen_random_uuid(),
        invoice_id uuid NOT NULL,
        total_amount numeric(12,2) NOT NULL,
        down_payment numeric(12,2) NOT NULL DEFAULT 0,
        installment_count integer NOT NULL,
        installment_amount numeric(12,2) NOT NULL,
        frequency varchar(20) NOT NULL,
        start_date date NOT NULL,
        status varchar(20) NOT NULL DEFAULT 'active',
        created_at timestamptz NOT NULL DEFAULT now(),
        updated_at timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT payment_plans_pkey PRIMARY KEY (id),
        CONSTRAINT fk_payment_plans_invoice FOREIGN KEY (invoice_id)
          REFERENCES invoices (id) ON DELETE CASCADE
      )
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_payment_plans_invoice_id_status
      ON payment_plans (invoice_id, status)
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS payment_plan_installments (
        id uuid NOT NULL DEFAULT gen_random_uuid(),
        payment_plan_id uuid NOT NULL,
        installment_number integer NOT NULL,
        due_date date NOT NULL,
        amount numeric(12,2) NOT NULL,
        paid_amount numeric(12,2) NOT NULL DEFAULT 0,
        status varchar(20) NOT NULL DEFAULT 'pending',
        paid_date date,
        overdue_date date,
        created_at timestamptz NOT NULL DEFAULT now(),
        updated_at timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT payment_plan_installments_pkey PRIMARY KEY (id),
        CONSTRAINT fk_payment_plan_installments_plan FOREIGN KEY (payment_plan_id)
          REFERENCES payment_plans (id) ON DELETE CASCADE
      )
    `);
    await queryRunner.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS uq_payment_plan_installments_number
      ON payment_plan_installments (payment_plan_id, installment_number)
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_payment_plan_installments_status_due_date
      ON payment_plan_installments (status, due_date)
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS invoice_payments (
        id uuid NOT NULL DEFAULT gen_random_uuid(),
        invoice_id uuid NOT NULL,
        payment_plan_id uuid,
        payment_date date NOT NULL,
        amount numeric(12,2) NOT NULL,
        payment_method varchar(20) NOT NULL DEFAULT 'other',
        reference varchar(100),
        notes text,
        created_at timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT invoice_payments_pkey PRIMARY KEY (id),
        CONSTRAINT chk_invoice_payments_amount CHECK (amount > 0),
        CONSTRAINT fk_invoice_payments_invoice FOREIGN KEY (invoice_id)
          REFERENCES invoices (id) ON DELETE CASCADE,
        CONSTRAINT fk_invoice_payments_plan FOREIGN KEY (payment_plan_id)
          REFERENCES payment_plans (id) ON DELETE SET NULL
      )
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_invoice_payments_invoice_id ON invoice_payments (invoice_id)
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_invoice_payments_payment_plan_id
      ON invoice_payments (payment_plan_id)
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS invoice_payments`);
    await queryRunner.query(`DROP TABLE IF EXISTS payment_plan_installments`);
    await queryRunner.query(`DROP TABLE IF EXISTS payment_plans`);
    await queryRunner.query(
      `ALTER TABLE IF EXISTS recurring_invoice_instances DROP CONSTRAINT IF EXISTS fk_recurring_invoice_instances_invoice`,
    );
    await queryRunner.query(`DROP TABLE IF EXISTS invoices`);
    await queryRunner.query(`DROP TABLE IF EXISTS recurring_invoice_instances`);
    await queryRunner.query(`DROP TABLE IF EXISTS recurring_invoices`);
  }
}
