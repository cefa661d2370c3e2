export { FilterPanelView } from './FilterPanelView';
export { TopPerformersView } from './TopPerformersView';
export { ComparisonView } from './ComparisonView';
export { OpponentView } from './OpponentView';
export { ErrorView, describeError } from './ErrorView';
export { LoadingView } from './LoadingView';
