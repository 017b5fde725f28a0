import { IMetricsPort, NoOpMetricsAdapter } from '../../domain/ports/IMetricsPort';
import { ConsoleMetricsAdapter } from './ConsoleMetricsAdapter';
import { PrometheusMetricsAdapter } from './PrometheusMetricsAdapter';

export type MetricsBackend = 'console' | 'prometheus' | 'none';

export function createMetricsAdapter(backend: MetricsBackend): IMetricsPort {
    switch (backend) {
        case 'prometheus':
            return new PrometheusMetricsAdapter();
        case 'none':
            return new NoOpMetricsAdapter();
        case 'console':
            return new ConsoleMetricsAdapter();
    }
}
