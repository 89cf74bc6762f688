import { Module } from '@nestjs/common';
import { CleanupModule } from '../cleanup/cleanup.module';
import { RcloneModule } from '../rclone/rclone.module';
import { RecordingsModule } from '../recordings/recordings.module';
import { SlackModule } from '../slack/slack.module';
import { ZoomModule } from '../zoom/zoom.module';
import { TransferService } from './transfer.service';

@Module({
  imports: [ZoomModule, RecordingsModule, RcloneModule, SlackModule, CleanupModule],
  providers: [TransferService],
  exports: [TransferService],
})
export class TransferModule {}
