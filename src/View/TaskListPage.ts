import { html } from 'hono/html';
import type { TaskEntity } from '../Entity/TaskEntity';
import type { FieldErrors } from '../Entity/Result';
import type { TaskOverview } from '../Service/TaskMutationService';
import { layout, type HtmlContent } from './Layout';

export interface TaskListPageProps {
	overview: TaskOverview;
	csrfToken: string;
	flash?: string;
	notice?: string;
	// 作成フォームの入力エラーと、再表示する入力値
	errors?: FieldErrors;
	values?: Record<string, string>;
}

function fieldErrors(errors: FieldErrors | undefined, field: string): HtmlContent | string {
	const messages = errors?.[field];
	if (!messages || messages.length === 0) {
		return '';
	}

	return html`<ul class="field-errors" data-field="${field}">
		${messages.map((message) => html`<li>${message}</li>`)}
	</ul>`;
}

function taskItem(task: TaskEntity, today: string, csrfToken: string): HtmlContent {
	const overdue = !task.completed && task.dueDate !== null && task.dueDate < today;
	const classes = ['task-item', task.completed ? 'completed' : '', overdue ? 'overdue' : ''].filter(Boolean).join(' ');

	return html`<li class="${classes}" data-task-id="${task.id}">
		<label class="task-checkbox">
			<input type="checkbox" class="task-checkbox-input" data-task-id="${task.id}" ${task.completed ? 'checked' : ''} />
			<span class="task-title">${task.title}</span>
		</label>
		${task.dueDate ? html`<time class="task-due" datetime="${task.dueDate}">${task.dueDate}</time>` : ''}
		<form method="post" action="/tasks/${task.id}/delete" class="delete-form">
			<input type="hidden" name="csrf_token" value="${csrfToken}" />
			<button type="submit" class="delete-btn" data-task-id="${task.id}">Delete</button>
		</form>
	</li>`;
}

// タスク一覧ページ
// - 未完了と完了済みを別のリストに分け、集計値は total / completed / active の順に並べる
export function taskListPage({ overview, csrfToken, flash, notice, errors, values }: TaskListPageProps): HtmlContent {
	const { activeTasks, completedTasks, counts, today } = overview;

	const body = html`<h1>Tasks</h1>
		<section class="stats">
			<div class="stat"><span class="stat-value">${counts.total}</span><span class="stat-label">Total</span></div>
			<div class="stat"><span class="stat-value">${counts.completed}</span><span class="stat-label">Completed</span></div>
			<div class="stat"><span class="stat-value">${counts.active}</span><span class="stat-label">Active</span></div>
		</section>
		<form id="task-form" method="post" action="/tasks" novalidate>
			<input type="hidden" name="csrf_token" value="${csrfToken}" />
			<input type="text" name="title" class="task-input" maxlength="200" placeholder="Enter a new task..." value="${values?.title ?? ''}" autofocus />
			${fieldErrors(errors, 'title')}
			<label>Due date <input type="date" name="due_date" value="${values?.due_date ?? ''}" /></label>
			${fieldErrors(errors, 'due_date')}
			<button type="submit">Add</button>
		</form>
		${counts.total === 0 ? html`<p class="empty-state">No tasks yet.</p>` : ''}
		<h2>Active</h2>
		<ul id="active-tasks" class="task-list">
			${activeTasks.map((task) => taskItem(task, today, csrfToken))}
		</ul>
		<h2>Completed</h2>
		<ul id="completed-tasks" class="task-list">
			${completedTasks.map((task) => taskItem(task, today, csrfToken))}
		</ul>`;

	return layout({ title: 'Tasks', csrfToken, flash, notice, body });
}
