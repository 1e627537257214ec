export const SOLARCALC_DIRS = {
  root: '.solarcalc',
  reports: 'reports',
  dashboards: 'dashboards',
  fixtures: 'fixtures',
  config: 'config.json',
} as const;
