import { Module } from '@nestjs/common';
import { GraphStoreModule } from './modules/graph-store/graph-store.module';
import { IngestionModule } from './modules/ingestion/ingestion.module';

@Module({
  imports: [GraphStoreModule, IngestionModule],
  exports: [IngestionModule],
})
export class StixLoaderModule {}
