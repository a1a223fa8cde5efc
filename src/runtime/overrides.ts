export interface RuntimeOverrides {
  autoRefreshInterval?: number;
  autoRefreshOnStartup?: boolean;
  initialFocusPanel?: number;
  verdiCommand?: string;
}

let runtimeOverrides: RuntimeOverrides = {};

export const setRuntimeOverrides = ({ overrides }: { overrides: RuntimeOverrides }): void => {
  runtimeOverrides = overrides;
};

export const getRuntimeOverrides = (): RuntimeOverrides => runtimeOverrides;
