import type { ModelIndex } from '../../model/model-index.js';
import { ElementType, RelationshipType } from '../../model/model-types.js';
import type { ModelElement, ProcessAnalysis, ProcessInfo } from '../../model/model-types.js';

function findServingComponent(index: ModelIndex, processId: string): ModelElement | undefined {
  for (const relationship of index.getIncomingRelationships(processId)) {
    if (relationship.type !== RelationshipType.Serving) continue;
    const source = index.getElement(relationship.source);
    if (source?.type === ElementType.ApplicationComponent) {
      return source;
    }
  }
  return undefined;
}

/**
 * Split every business process into served and unserved.
 *
 * Only the first serving application component (in document order) is
 * recorded for a process; later servers get no credit for it.
 */
export function classifyProcesses(index: ModelIndex): ProcessAnalysis {
  const servedProcesses: ProcessInfo[] = [];
  const unservedProcesses: ProcessInfo[] = [];
  const appComponentServices = new Map<string, string[]>();

  for (const element of index.elements()) {
    if (element.type !== ElementType.BusinessProcess) continue;

    const component = findServingComponent(index, element.id);
    if (!component) {
      unservedProcesses.push({ name: element.name });
      continue;
    }

    servedProcesses.push({ name: element.name, servingComponent: component.name });
    const served = appComponentServices.get(component.name);
    if (served) {
      served.push(element.name);
    } else {
      appComponentServices.set(component.name, [element.name]);
    }
  }

  return { servedProcesses, unservedProcesses, appComponentServices };
}
