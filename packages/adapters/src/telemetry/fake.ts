import { type RemoteCallEvent, type TelemetrySinkPort } from '@flotilla/core';

export class FakeTelemetrySink implements TelemetrySinkPort {
    public readonly events: RemoteCallEvent[] = [];

    public emit(event: RemoteCallEvent): void {
        this.events.push(event);
    }
}
