import { Module } from '@nestjs/common';
import { ActionPersonalizerService } from './action-personalizer.service';

@Module({
  providers: [ActionPersonalizerService],
  exports: [ActionPersonalizerService],
})
export class ActionPersonalizerModule {}
