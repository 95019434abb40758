import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { join } from 'path';
import configuration from './configuration';

// The HTTP server and the CLI both start from the repository root, so the
// optional .env is looked up there rather than next to the compiled code.
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [configuration],
      envFilePath: join(process.cwd(), '.env'),
    }),
  ],
})
export class ConfigModule {}
