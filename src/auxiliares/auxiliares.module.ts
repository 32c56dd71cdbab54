import { Module } from '@nestjs/common';
import { ActionLogService } from './logger/action-log.service';

@Module({
  imports: [],
  providers: [ActionLogService],
  exports: [ActionLogService],
})
export class AuxiliaresModule {}
