export interface Task {
  key: string;
  summary: string;
  description: string;
  status: string;
  labels: string[];
}

/**
 * The issue tracker side of a run: where tasks come from and where
 * progress is reported back to.
 */
export interface TaskTracker {
  readonly name: string;
  getCurrentUser(): Promise<string>;
  searchTasks(query: string, maxResults: number): Promise<Task[]>;
  getTask(key: string): Promise<Task>;
  transitionTask(key: string, statusName: string): Promise<void>;
  addComment(key: string, body: string): Promise<void>;
}
