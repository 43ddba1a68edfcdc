import { EventEmitter } from 'eventemitter3';

type Listener<T> = (data: T) => void;

export class EventBus<TEvents extends object> {
  private emitter = new EventEmitter();

  on<K extends keyof TEvents & string>(event: K, listener: Listener<TEvents[K]>): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof TEvents & string>(event: K, listener: Listener<TEvents[K]>): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof TEvents & string>(event: K, listener: Listener<TEvents[K]>): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof TEvents & string>(event: K, data: TEvents[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
