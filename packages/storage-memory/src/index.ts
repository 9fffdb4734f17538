/**
 * Skiff Storage Memory
 *
 * In-memory backend driver (testing and development).
 */

export {
  createMemoryDriver,
  createMemoryDriverWithInspection,
  type MemoryDriverCall,
  type MemoryDriverConfig,
  type MemoryDriverInspection,
} from "./memory-driver.ts";
