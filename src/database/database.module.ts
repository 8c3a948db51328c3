import { Module } from '@nestjs/common';
import { databaseProvider } from './database.provider';

// ConfigService comes from the global ConfigModule
@Module({
  providers: [databaseProvider],
  exports: [databaseProvider],
})
export class DatabaseModule {}
