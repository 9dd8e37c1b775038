export type RouteOption = {
  mode: string;
  duration: string;
  cost: string;
  steps: string[];
  accessibility_score: number;
};

export type RouteNetworkEntry = {
  id: number;
  name: string;
  modes: string[];
  distance: number;
};

export type RouteNetwork = {
  routes: RouteNetworkEntry[];
  real_time_status: 'active';
};

export type PreferenceRecord = {
  mode: string;
  accessibility: boolean;
};

export type AgentStatus = {
  name: string;
  status: 'active';
};
