import { Module } from '@nestjs/common';
import { VerdictService } from './verdict.service';

@Module({
  providers: [VerdictService],
  exports: [VerdictService],
})
export class VerdictModule {}
