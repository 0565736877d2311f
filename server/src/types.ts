export interface Frame {
  readonly index: number;
  readonly reference: string;
}

export interface Resolution {
  width: number;
  height: number;
}

export type SourceConfig =
  | {
      kind: 'directory';
      directory: string;
      format: string;
      cycle: boolean;
    }
  | {
      kind: 'synthetic';
      resolution: Resolution;
      savePath: string;
      retain: number;
    };

export type SchedulerState = 'idle' | 'running' | 'stopped' | 'exhausted' | 'failed';

export type DeliveryPolicy = 'coalesce' | 'queue';

export interface ChannelStats {
  name: string;
  policy: DeliveryPolicy;
  live: boolean;
  subscribers: number;
  published: number;
  delivered: number;
  dropped: number;
}
