/**
 * Task operations barrel export.
 */

export { addTask, validateAssignee, validateDueDate, type AddTaskOptions } from './add.js';
export { listTasks, type ListTasksOptions } from './list.js';
export { completeTask, type CompleteTaskOptions } from './complete.js';
export { updateTask, type UpdateTaskOptions } from './update.js';
export { deleteTask, type DeleteTaskOptions } from './delete.js';
export { findTask } from './lookup.js';
