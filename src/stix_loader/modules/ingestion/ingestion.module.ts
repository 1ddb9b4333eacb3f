import { Module } from '@nestjs/common';
import { GraphMappingModule } from '../graph-mapping/graph-mapping.module';
import { StixParserModule } from '../stix-parser/stix-parser.module';
import { StixFileLoaderService } from './stix-file-loader.service';

@Module({
  imports: [StixParserModule, GraphMappingModule],
  providers: [StixFileLoaderService],
  exports: [StixFileLoaderService],
})
export class IngestionModule {}
