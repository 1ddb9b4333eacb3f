import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import graphStoreConfig, { graphStoreConfigSchema } from './stix_loader/config/graph-store.config';
import loaderConfig, { loaderConfigSchema } from './stix_loader/config/loader.config';
import { StixLoaderModule } from './stix_loader/stix-loader.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [graphStoreConfig, loaderConfig],
      validationSchema: graphStoreConfigSchema.concat(loaderConfigSchema),
    }),
    StixLoaderModule,
  ],
})
export class AppModule {}
