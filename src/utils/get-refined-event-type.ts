import { RefinedEventType } from '@/enums/refined-event-type.enum';
import { ResourceEventType } from '@/enums/resource-event-type.enum';
import type { ResourceEvent } from '@/interfaces/resource-event.interface';

export const getRefinedEventType = (event: ResourceEvent): RefinedEventType => {
  if (event.type === ResourceEventType.Deleted) {
    return RefinedEventType.Deleted;
  }

  if (event.object.metadata.deletionTimestamp !== undefined) {
    return RefinedEventType.Deleting;
  }

  return event.type;
};
