interface ItemLifeCycleEvents<T> {
  'item:enqueued': { item: T; size: number };
  'item:rejected': { item: T; capacity: number };
  'item:evicted': { item: T };
  'item:dequeued': { item: T; size: number };
}

interface QueueStateEvents {
  'queue:full': { capacity: number };
  'queue:drained': { capacity: number };
}

export type BoundedQueueEventMap<T> = ItemLifeCycleEvents<T> & QueueStateEvents;
