import type { TransferJob } from './transfer-job.js';

export class TransferQueue {
  private readonly queue: TransferJob[] = [];

  enqueue(job: TransferJob): void {
    this.queue.push(job);
  }

  enqueueFront(job: TransferJob): void {
    this.queue.unshift(job);
  }

  dequeue(): TransferJob | undefined {
    return this.queue.shift();
  }

  remove(job: TransferJob): TransferJob | undefined {
    const index = this.queue.indexOf(job);
    if (index === -1) {
      return undefined;
    }

    const [removed] = this.queue.splice(index, 1);
    return removed;
  }

  toArray(): TransferJob[] {
    return [...this.queue];
  }

  getSize(): number {
    return this.queue.length;
  }
}
