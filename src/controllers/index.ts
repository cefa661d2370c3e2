export * from './DashboardController';
