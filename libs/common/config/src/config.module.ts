/**
 * Todos Config Module
 * Global configuration shared by every feature module
 */

import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

@Module({
  imports: [
    NestConfigModule.forRoot({
      load: [configuration],
      isGlobal: true,
      cache: true,
    }),
  ],
  exports: [NestConfigModule],
})
export class TodosConfigModule {}
