import { ResourceEventType } from './resource-event-type.enum';

export const RefinedEventType = {
  ...ResourceEventType,
  Deleting: 'DELETING',
} as const;

export type RefinedEventType = (typeof RefinedEventType)[keyof typeof RefinedEventType];
