export { formatDashboard, formatExpenseLine } from './dashboard';
