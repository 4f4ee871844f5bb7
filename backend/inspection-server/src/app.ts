/**
 * Service wiring
 *
 * Builds every store and service on top of one database handle. Nothing is
 * global: the server entry point and tests each create their own.
 */

import { DatabaseHandle } from "./db/connection";
import {
  TaskQueueRepository,
  TaskRecordRepository,
  AlertRepository,
  CartStatusRepository,
} from "./repositories";
import { BroadcastHub, Dispatcher } from "./queue";
import {
  AlertEvaluator,
  CartStatusRegister,
  HistoryService,
  LockController,
  ResultIngestion,
  StationRegistry,
  TemperatureThresholds,
} from "./services";

export interface InspectionServicesOptions {
  stations?: StationRegistry;
  subscriberBuffer?: number;
  lockDebounceMs?: number;
  temperatureThresholds?: TemperatureThresholds;
}

export interface InspectionServices {
  handle: DatabaseHandle;
  hub: BroadcastHub;
  dispatcher: Dispatcher;
  ingestion: ResultIngestion;
  history: HistoryService;
  cart: CartStatusRegister;
  evaluator: AlertEvaluator;
  stations?: StationRegistry;
  /** New lock controller for one observer */
  createLockController: () => LockController;
  /** Close the hub, then the database */
  close: () => void;
}

export function createInspectionServices(
  handle: DatabaseHandle,
  options: InspectionServicesOptions = {}
): InspectionServices {
  const hub = new BroadcastHub({ capacity: options.subscriberBuffer });
  const dispatcher = new Dispatcher(new TaskQueueRepository(handle.db), hub, {
    stations: options.stations,
  });
  const evaluator = new AlertEvaluator(options.temperatureThresholds);

  return {
    handle,
    hub,
    dispatcher,
    ingestion: new ResultIngestion({ db: handle.db, dispatcher, hub, evaluator }),
    history: new HistoryService(new TaskRecordRepository(handle.db), new AlertRepository(handle.db)),
    cart: new CartStatusRegister(new CartStatusRepository(handle.db), hub),
    evaluator,
    stations: options.stations,
    createLockController: () =>
      new LockController(dispatcher, hub, { debounceMs: options.lockDebounceMs }),
    close: () => {
      hub.close();
      handle.close();
    },
  };
}
