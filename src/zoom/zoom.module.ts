import { Module } from '@nestjs/common';
import { ZoomAuthService } from './zoom-auth.service';
import { ZoomRecordingsService } from './zoom-recordings.service';

@Module({
  providers: [ZoomAuthService, ZoomRecordingsService],
  exports: [ZoomAuthService, ZoomRecordingsService],
})
export class ZoomModule {}
