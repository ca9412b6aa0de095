import { OnModuleInit, OnModuleDestroy } from "@nestjs/common";
import type { Constructor, AbstractConstructor, IBaseService } from "../../types/services";
import { toError } from "../../utils/error.utils";

/**
 * Lifecycle management capabilities
 */
export interface LifecycleCapabilities {
  createInterval(callback: () => void, delay: number): NodeJS.Timeout;
  initialize?(): Promise<void>;
  cleanup?(): Promise<void>;
}

/**
 * Mixin that adds lifecycle management to a service.
 * Intervals created through it are cleared when the Nest context closes.
 */
export function WithLifecycle<TBase extends Constructor | AbstractConstructor>(Base: TBase) {
  return class LifecycleMixin extends Base implements OnModuleInit, OnModuleDestroy, LifecycleCapabilities {
    public initializationPromise?: Promise<void>;
    public cleanupPromise?: Promise<void>;
    public managedIntervals = new Set<NodeJS.Timeout>();

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
    }

    async onModuleInit(): Promise<void> {
      if (!this.initializationPromise) {
        this.initializationPromise = this.performInitialization();
      }
      return this.initializationPromise;
    }

    async onModuleDestroy(): Promise<void> {
      if (!this.cleanupPromise) {
        this.cleanupPromise = this.performCleanup();
      }
      return this.cleanupPromise;
    }

    createInterval(callback: () => void, delay: number): NodeJS.Timeout {
      const interval = setInterval(callback, delay);
      this.managedIntervals.add(interval);
      return interval;
    }

    initialize?(): Promise<void>;
    cleanup?(): Promise<void>;

    public async performInitialization(): Promise<void> {
      try {
        await this.initialize?.();
        (this as unknown as IBaseService).logger.debug("Service initialized");
      } catch (error) {
        (this as unknown as IBaseService).logError(toError(error), "Service initialization failed");
        throw error;
      }
    }

    public async performCleanup(): Promise<void> {
      try {
        this.managedIntervals.forEach(interval => clearInterval(interval));
        this.managedIntervals.clear();

        await this.cleanup?.();

        (this as unknown as IBaseService).logger.debug("Service cleanup completed");
      } catch (error) {
        (this as unknown as IBaseService).logError(toError(error), "Service cleanup failed");
        throw error;
      }
    }
  };
}
