import { Injectable, Logger } from '@nestjs/common';
import {
  KillChainPhase,
  StixAuxiliaryObject,
  StixDomainObject,
  StixObject,
} from '../../core/types/stix-types';
import { DuplicateObjectError, errorMessage } from '../../core/exception/custom-exceptions';
import { MakerSupportService, asCleanLabel, asNodeProperties } from './maker-support.service';
import { MappingContext } from './mapping-context';

function killChainPhasesOf(obj: StixDomainObject | StixAuxiliaryObject): KillChainPhase[] | undefined {
  switch (obj.type) {
    case 'attack-pattern':
    case 'incident':
    case 'indicator':
    case 'infrastructure':
    case 'malware':
    case 'tool':
      return obj.kill_chain_phases;
    default:
      return undefined;
  }
}

@Injectable()
export class NodesMakerService {
  private readonly logger = new Logger(NodesMakerService.name);

  constructor(private readonly support: MakerSupportService) {}

  /**
   * Creates the node of one STIX object, and the satellites of its embedded
   * collections. Failures are logged and the object is skipped; this never
   * rejects.
   */
  async createNodes(obj: StixObject, context: MappingContext): Promise<void> {
    try {
      const properties = asNodeProperties(obj);
      const node = await context.store.transaction(async (tx) => {
        if (await context.index.resolve(tx, obj.id)) {
          throw new DuplicateObjectError(obj.id);
        }
        return tx.createNode(asCleanLabel(obj.type), properties);
      });
      context.index.register(obj.id, node);
      context.counter.increment(obj.type);
      context.pendingRelations.add(obj.id);
    } catch (error) {
      this.logger.error(`could not create node ${obj.id}: ${errorMessage(error)}`);
      return;
    }

    // relationship objects get their satellites once their base edge exists
    if (obj.type === 'relationship' || obj.type === 'sighting') {
      return;
    }
    await this.createSatellites(obj, context);
  }

  private async createSatellites(obj: StixDomainObject | StixAuxiliaryObject, context: MappingContext): Promise<void> {
    await this.support.createExternRefs(context, obj.id, obj.external_references);
    await this.support.createGranulars(context, obj.id, obj.granular_markings);
    await this.support.createKillPhases(context, obj.id, killChainPhasesOf(obj));
    if (obj.type === 'observed-data') {
      await this.support.createObservables(context, obj.id, obj.objects);
    }
  }
}
