import type { TaskEntity } from '../Entity/TaskEntity';

export interface YearMonth {
	year: number;
	// 1 始まりの月
	month: number;
}

export interface CalendarDay {
	day: number;
	// YYYY-MM-DD
	date: string;
	tasks: TaskEntity[];
	isToday: boolean;
	isPast: boolean;
}

export interface CalendarMonth extends YearMonth {
	monthName: string;
	firstDay: string;
	lastDay: string;
	daysInMonth: number;
	// 月曜始まりで 1 日の前に空ける日数
	leadingBlanks: number;
	// 先頭の空白は null
	cells: (CalendarDay | null)[];
	prev: YearMonth;
	next: YearMonth;
}

const monthFormat = new Intl.DateTimeFormat('en-US', { month: 'long', timeZone: 'UTC' });

function pad(value: number, length: number): string {
	return String(value).padStart(length, '0');
}

// 年が 100 未満でも 1900 年代にずれないように UTC の日付を作る
function utcDate(year: number, month: number, day: number): Date {
	const date = new Date(Date.UTC(2000, month - 1, day));
	date.setUTCFullYear(year);
	return date;
}

export function formatDate(year: number, month: number, day: number): string {
	return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

// YYYY-MM-DD が実在する日付かどうか
export function isCalendarDate(value: string): boolean {
	const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
	if (!match) {
		return false;
	}

	const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
	if (year < 1 || month < 1 || month > 12 || day < 1) {
		return false;
	}

	return day <= daysInMonth(year, month);
}

function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
	if (month === 2) {
		return isLeapYear(year) ? 29 : 28;
	}

	return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

// クエリ文字列の年・月を解釈し、不正なら今月に戻す
export function resolveMonth(year: string | undefined, month: string | undefined, today: string): YearMonth {
	const current = { year: Number(today.slice(0, 4)), month: Number(today.slice(5, 7)) };

	if (year === undefined && month === undefined) {
		return current;
	}

	const parsedYear = year === undefined ? current.year : Number(year);
	const parsedMonth = month === undefined ? current.month : Number(month);

	if (!Number.isInteger(parsedYear) || !Number.isInteger(parsedMonth)) {
		return current;
	}

	if (parsedYear < 1 || parsedYear > 9999 || parsedMonth < 1 || parsedMonth > 12) {
		return current;
	}

	return { year: parsedYear, month: parsedMonth };
}

export function previousMonth({ year, month }: YearMonth): YearMonth {
	return month === 1 ? { year: year - 1, month: 12 } : { year, month: month - 1 };
}

export function nextMonth({ year, month }: YearMonth): YearMonth {
	return month === 12 ? { year: year + 1, month: 1 } : { year, month: month + 1 };
}

// 月のカレンダーを組み立てる
// - tasks はその月に期限があるタスク（期限日ごとにまとめる）
export function buildCalendarMonth({ year, month }: YearMonth, tasks: TaskEntity[], today: string): CalendarMonth {
	const days = daysInMonth(year, month);

	// 期限日ごとにタスクをまとめる
	const tasksByDate = new Map<string, TaskEntity[]>();
	for (const task of tasks) {
		if (!task.dueDate) {
			continue;
		}

		const list = tasksByDate.get(task.dueDate) ?? [];
		list.push(task);
		tasksByDate.set(task.dueDate, list);
	}

	// getUTCDay は日曜 = 0 なので月曜 = 0 にずらす
	const leadingBlanks = (utcDate(year, month, 1).getUTCDay() + 6) % 7;

	const cells: (CalendarDay | null)[] = Array.from({ length: leadingBlanks }, () => null);
	for (let day = 1; day <= days; day++) {
		const date = formatDate(year, month, day);
		cells.push({
			day,
			date,
			tasks: tasksByDate.get(date) ?? [],
			isToday: date === today,
			isPast: date < today,
		});
	}

	return {
		year,
		month,
		monthName: monthFormat.format(utcDate(year, month, 1)),
		firstDay: formatDate(year, month, 1),
		lastDay: formatDate(year, month, days),
		daysInMonth: days,
		leadingBlanks,
		cells,
		prev: previousMonth({ year, month }),
		next: nextMonth({ year, month }),
	};
}
