import type { GatewayResponse } from './orchestrator';

export type DispatchMetric =
    | 'total_messages'
    | 'total_dispatched'
    | 'total_validation_failed'
    | 'total_routing_failed'
    | 'total_downstream_failed';

export interface DispatchStats {
    increment(metric: DispatchMetric): void;
    record(response: GatewayResponse): void;
    snapshot(): Record<DispatchMetric, number>;
}

export function createDispatchStats(): DispatchStats {
    const stats: Record<DispatchMetric, number> = {
        total_messages: 0,
        total_dispatched: 0,
        total_validation_failed: 0,
        total_routing_failed: 0,
        total_downstream_failed: 0,
    };

    const increment = (metric: DispatchMetric) => {
        stats[metric]++;
    };

    return {
        increment,
        record(response) {
            increment('total_messages');
            if (response.state === 'Completed') {
                increment('total_dispatched');
                return;
            }
            const category = response.result.error?.category;
            if (category === 'validation') increment('total_validation_failed');
            if (category === 'routing') increment('total_routing_failed');
            if (category === 'downstream') increment('total_downstream_failed');
        },
        snapshot() {
            return { ...stats };
        },
    };
}
