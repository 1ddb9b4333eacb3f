import { Module } from '@nestjs/common';
import { StixParserService } from './stix-parser.service';

@Module({
  providers: [StixParserService],
  exports: [StixParserService],
})
export class StixParserModule {}
