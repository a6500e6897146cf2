export {
  GitHubTaskViewSource,
  StaticTaskViewSource,
  DEFAULT_TASK_VIEW_URL,
  parseTaskViewMarkdown,
  isValidTaskViewName,
  type TaskViewSource,
  type GitHubTaskViewSourceConfig,
} from './TaskViewSource.js'
