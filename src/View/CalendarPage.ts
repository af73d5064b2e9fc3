import { html } from 'hono/html';
import type { CalendarDay, CalendarMonth } from '../Service/calendar';
import { layout, type HtmlContent } from './Layout';

const WEEKDAYS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];

function dayCell(cell: CalendarDay | null): HtmlContent {
	if (!cell) {
		return html`<td class="calendar-day empty"></td>`;
	}

	const classes = ['calendar-day', cell.isToday ? 'today' : '', cell.isPast ? 'past' : ''].filter(Boolean).join(' ');

	return html`<td class="${classes}" data-date="${cell.date}">
		<span class="calendar-day-number">${cell.day}</span>
		${cell.tasks.map(
			(task) => html`<div class="calendar-task${task.completed ? ' completed' : ''}" data-task-id="${task.id}">${task.title}</div>`
		)}
	</td>`;
}

// 7 日ごとに行へ分ける
function weeks(cells: (CalendarDay | null)[]): (CalendarDay | null)[][] {
	const rows: (CalendarDay | null)[][] = [];
	for (let i = 0; i < cells.length; i += 7) {
		rows.push(cells.slice(i, i + 7));
	}
	return rows;
}

export function calendarPage(calendar: CalendarMonth, csrfToken: string): HtmlContent {
	const { prev, next } = calendar;

	const body = html`<h1>${calendar.monthName} ${calendar.year}</h1>
		<nav class="calendar-nav">
			<a class="calendar-prev" href="/tasks/calendar?year=${prev.year}&month=${prev.month}">&larr;</a>
			<a class="calendar-next" href="/tasks/calendar?year=${next.year}&month=${next.month}">&rarr;</a>
		</nav>
		<table class="calendar">
			<thead>
				<tr>
					${WEEKDAYS.map((day) => html`<th>${day}</th>`)}
				</tr>
			</thead>
			<tbody>
				${weeks(calendar.cells).map((week) => html`<tr>${week.map(dayCell)}</tr>`)}
			</tbody>
		</table>`;

	return layout({ title: `Calendar - ${calendar.monthName} ${calendar.year}`, csrfToken, body });
}
