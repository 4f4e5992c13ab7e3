import { type Logger } from '@flotilla/core';

export interface FakeLogEntry {
    level: string;
    obj: Record<string, unknown>;
    msg?: string;
}

/**
 * Collects entries in memory. Children share the parent's entry list and
 * merge their bindings into `obj`, so tests can assert on component fields.
 */
export class FakeLogger implements Logger {
    public readonly logs: FakeLogEntry[];
    private readonly bindings: Record<string, unknown>;

    public constructor(logs: FakeLogEntry[] = [], bindings: Record<string, unknown> = {}) {
        this.logs = logs;
        this.bindings = bindings;
    }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('trace', arg1, arg2);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('debug', arg1, arg2);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('info', arg1, arg2);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('warn', arg1, arg2);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('error', arg1, arg2);
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new FakeLogger(this.logs, { ...this.bindings, ...bindings });
    }

    public entries(level: string): FakeLogEntry[] {
        return this.logs.filter((entry) => entry.level === level);
    }

    private log(level: string, arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.logs.push({ level, obj: { ...this.bindings }, msg: arg1 });
            return;
        }
        const entry: FakeLogEntry = { level, obj: { ...this.bindings, ...arg1 } };
        if (arg2 !== undefined) {
            entry.msg = arg2;
        }
        this.logs.push(entry);
    }
}
