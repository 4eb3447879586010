import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateAccounts1760000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE accounts (
        id UUID PRIMARY KEY,
        email VARCHAR(255) NOT NULL,
        username VARCHAR(100) NOT NULL,
        password_hash VARCHAR(255),
        auth_provider VARCHAR(32),
        auth_provider_id VARCHAR(255),
        first_name VARCHAR(100),
        last_name VARCHAR(100),
        nickname VARCHAR(100),
        phone VARCHAR(20),
        avatar_url VARCHAR(500),
        bio TEXT,
        email_verified BOOLEAN NOT NULL DEFAULT false,
        email_verification_token VARCHAR(255),
        email_verification_expires_at TIMESTAMP,
        password_reset_token VARCHAR(255),
        password_reset_expires_at TIMESTAMP,
        role VARCHAR(16) NOT NULL DEFAULT 'user',
        status VARCHAR(16) NOT NULL DEFAULT 'pending',
        suspension_reason VARCHAR(500),
        is_active BOOLEAN NOT NULL DEFAULT true,
        last_login_at TIMESTAMP,
        last_login_ip VARCHAR(45),
        created_at TIMESTAMP NOT NULL DEFAULT now(),
        updated_at TIMESTAMP NOT NULL DEFAULT now(),
        deleted_at TIMESTAMP,
        CONSTRAINT chk_accounts_role CHECK (role IN ('user', 'moderator', 'admin')),
        CONSTRAINT chk_accounts_status CHECK (
          status IN ('pending', 'active', 'inactive', 'suspended', 'deleted')
        ),
        CONSTRAINT chk_accounts_deleted CHECK (deleted_at IS NULL OR status = 'deleted'),
        CONSTRAINT chk_accounts_provider_pair CHECK (
          (auth_provider IS NULL) = (auth_provider_id IS NULL)
        )
      );
    `);

    // Soft-deleted rows must not block re-registration
    await queryRunner.query(`
      CREATE UNIQUE INDEX uq_accounts_email_live
      ON accounts(email) WHERE deleted_at IS NULL;
    `);
    await queryRunner.query(`
      CREATE UNIQUE INDEX uq_accounts_username_live
      ON accounts(username) WHERE deleted_at IS NULL;
    `);
    await queryRunner.query(`
      CREATE UNIQUE INDEX uq_accounts_external_identity_live
      ON accounts(auth_provider, auth_provider_id)
      WHERE deleted_at IS NULL AND auth_provider_id IS NOT NULL;
    `);

    await queryRunner.query(`
      CREATE INDEX idx_accounts_email_verification_token
      ON accounts(email_verification_token);
    `);
    await queryRunner.query(`
      CREATE INDEX idx_accounts_password_reset_token
      ON accounts(password_reset_token);
    `);
    await queryRunner.query(`
      CREATE INDEX idx_accounts_deleted_at ON accounts(deleted_at);
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX IF EXISTS idx_accounts_deleted_at;`);
    await queryRunner.query(`DROP INDEX IF EXISTS idx_accounts_password_reset_token;`);
    await queryRunner.query(`DROP INDEX IF EXISTS idx_accounts_email_verification_token;`);
    await queryRunner.query(`DROP INDEX IF EXISTS uq_accounts_external_identity_live;`);
    await queryRunner.query(`DROP INDEX IF EXISTS uq_accounts_username_live;`);
    await queryRunner.query(`DROP INDEX IF EXISTS uq_accounts_email_live;`);
    await queryRunner.query(`DROP TABLE IF EXISTS accounts;`);
  }
}
