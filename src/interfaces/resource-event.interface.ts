import type { ResourceEventType } from '@/enums/resource-event-type.enum';
import type { LiveObject } from './manifest-object.interface';

export type ResourceEvent<T extends LiveObject = LiveObject> = { type: ResourceEventType; object: T };
