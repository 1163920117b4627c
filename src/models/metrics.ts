export type MetricType = 'gauge' | 'counter';

export type MetricSample = {
  name: string;
  help: string;
  type: MetricType;
  value: number;
  /** Extra labels beyond the device identity labels, for label-bearing gauges. */
  labels?: Readonly<Record<string, string>>;
};

export type MetricSnapshot = {
  capturedAt: number;
  samples: readonly MetricSample[];
  /** Facts the poll policy reads back from the latest telemetry. */
  activity: {
    charging: boolean;
    driving: boolean;
  };
  location: string | null;
};

export const freezeSnapshot = (snapshot: MetricSnapshot): Readonly<MetricSnapshot> =>
  Object.freeze({
    ...snapshot,
    activity: Object.freeze({ ...snapshot.activity }),
    samples: Object.freeze(
      snapshot.samples.map((sample) =>
        Object.freeze({
          ...sample,
          labels: sample.labels ? Object.freeze({ ...sample.labels }) : undefined,
        }),
      ),
    ),
  });
