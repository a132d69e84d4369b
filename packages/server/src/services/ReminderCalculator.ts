export interface ReminderDate {
    label: string;
    date: Date;
}

export type ReminderPair = readonly [ReminderDate, ReminderDate];

export const REMINDER_SCHEDULE = [
    { label: 'Guboro', offsetDays: 14 },
    { label: 'La Sota', offsetDays: 21 }
] as const;

function addDays(date: Date, days: number): Date {
    // calendar arithmetic on local date parts, immune to DST shifts
    return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/** YYYY-MM-DD from the local calendar date. */
export function formatDate(date: Date): string {
    const year = String(date.getFullYear()).padStart(4, '0');
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

export function calculateReminders(deliveryDate: Date): ReminderPair {
    const [first, second] = REMINDER_SCHEDULE;
    return [
        { label: first.label, date: addDays(deliveryDate, first.offsetDays) },
        { label: second.label, date: addDays(deliveryDate, second.offsetDays) }
    ];
}

/** "Guboro: 2024-03-15; La Sota: 2024-03-22". Written to the sheet as-is. */
export function formatReminders(reminders: ReminderPair): string {
    return reminders.map((reminder) => `${reminder.label}: ${formatDate(reminder.date)}`).join('; ');
}
