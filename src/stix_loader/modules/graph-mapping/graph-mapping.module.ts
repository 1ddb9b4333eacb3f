import { Module } from '@nestjs/common';
import { MakerSupportService } from './maker-support.service';
import { NodesMakerService } from './nodes-maker.service';
import { RelationsMakerService } from './relations-maker.service';

@Module({
  providers: [MakerSupportService, NodesMakerService, RelationsMakerService],
  exports: [NodesMakerService, RelationsMakerService],
})
export class GraphMappingModule {}
