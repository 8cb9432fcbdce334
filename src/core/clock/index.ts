export {
  SimulatedClock,
  type ClockStateStore,
  type DayProvider,
} from './simulated-clock';
