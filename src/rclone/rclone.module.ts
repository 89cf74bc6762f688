import { Module } from '@nestjs/common';
import { CommandRunner } from './command-runner';
import { RcloneService } from './rclone.service';

@Module({
  providers: [CommandRunner, RcloneService],
  exports: [RcloneService],
})
export class RcloneModule {}
