/**
 * Order Workflow Demo
 *
 * Builds an order machine with a composite review step, parallel payment and
 * shipping regions joined on completion, and a timeout on payment. Prints the
 * Mermaid diagram, drives one order through and prints the log summary.
 *
 * Usage:
 *   npm run example:orders
 */

import { MachineBuilder } from '../src/builder';
import { Event } from '../src/event';
import { createLogger } from '../src/logger';
import { generateMermaidDiagram } from '../src/mermaid-generator';
import { LoggingObserver } from '../src/monitoring';
import { MetricsObserver } from '../src/observers';
import { HistoryType } from '../src/types';

async function main(): Promise<void> {
  const logger = createLogger({ level: 'warn' });
  const logging = new LoggingObserver({ logger });
  const metrics = new MetricsObserver();

  const order = new MachineBuilder('Order', { logger, queueCapacity: 50, timerTickMs: 10 })
    .state('Draft')
    .composite('Review', review =>
      review
        .state('Checking')
        .choice('Route', route =>
          route.when(ctx => Number(ctx.get('amount')) > 1000, 'Manual').otherwise('Approved')
        )
        .state('Manual')
        .state('Approved')
        .internal('Checking', 'Route', 'CHECKED')
        .internal('Manual', 'Approved', 'APPROVE')
        .history('H', HistoryType.SHALLOW)
    )
    .parallel('Fulfilment', fulfilment =>
      fulfilment
        .region('payment', region =>
          region
            .timeout('AwaitingPayment', 2000, { target: 'Expired' })
            .final('Paid')
            .final('Expired')
            .transition('AwaitingPayment', 'Paid', 'PAID')
        )
        .region('shipping', region =>
          region.state('Packing').final('Shipped').transition('Packing', 'Shipped', 'SHIPPED')
        )
        .join('Closed')
    )
    .final('Closed')
    .transition('Draft', 'Review', 'SUBMIT')
    .transition('Review.Approved', 'Fulfilment', 'CONFIRM')
    .observer(logging)
    .observer(metrics)
    .build();

  console.log('\nMermaid diagram:\n');
  console.log(generateMermaidDiagram(order));

  order.getContext().set('amount', 1500);
  await order.start();
  for (const name of ['SUBMIT', 'CHECKED', 'APPROVE', 'CONFIRM', 'PAID', 'SHIPPED']) {
    await order.submit(Event.create(name));
    console.log(`${name.padEnd(8)} -> ${order.getActiveConfiguration().join(', ')}`);
  }

  console.log(`\nCompleted: ${order.isCompleted()}`);
  console.log(`\n${logging.generateSummary('Order')}`);
  console.log(`\n${metrics.getReport()}`);
  await order.stop();
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
