import { InMemoryScheduleStore } from '../services/scheduleStore';
import { Producer } from '../types';
import type { Visit } from '../types';
import schedule from './schedule.json';

export const makeVisit = (overrides: Partial<Visit> = {}): Visit => ({
    producer: Producer.SIRI,
    stopCode: '21470',
    routeId: '10938',
    lineId: '10938',
    directionId: '2',
    lineName: '480',
    operatorId: '3',
    destinationId: '12345',
    vehicleRef: '7419982',
    tripId: '30145678_030524',
    eta: new Date('2024-05-03T07:22:00Z'),
    departed: null,
    status: null,
    location: null,
    timestamp: new Date('2024-05-03T07:14:40Z'),
    ...overrides,
});

export const scheduleStore = () => new InMemoryScheduleStore(schedule);
