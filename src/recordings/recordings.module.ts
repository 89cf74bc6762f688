import { Module } from '@nestjs/common';
import { ZoomModule } from '../zoom/zoom.module';
import { RecordingDownloaderService } from './recording-downloader.service';

@Module({
  imports: [ZoomModule],
  providers: [RecordingDownloaderService],
  exports: [RecordingDownloaderService],
})
export class RecordingsModule {}
