export {
  type HealthService,
  type HealthStatus,
  type HealthLevel,
  type ComponentHealth,
  createHealthService,
} from "./health.service.js";
