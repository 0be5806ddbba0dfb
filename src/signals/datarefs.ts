import type { SignalName, SignalSource } from './SignalSource';

/**
 * X-Plane dataref behind each signal. Array datarefs take the engine or tank
 * index passed to `read`.
 */
export const XPLANE_DATAREFS: Record<SignalName, string> = {
  onGround: 'sim/flightmodel/failures/onground_any',
  engineRunning: 'sim/flightmodel/engine/ENGN_running',
  paused: 'sim/time/paused',
  groundSpeed: 'sim/flightmodel/position/groundspeed',
  indicatedAirspeed: 'sim/flightmodel/position/indicated_airspeed',
  verticalSpeed: 'sim/flightmodel/position/vh_ind',
  radioAltitude: 'sim/cockpit2/gauges/indicators/radio_altimeter_height_ft_pilot',
  altitudeAgl: 'sim/flightmodel/position/y_agl',
  flightTime: 'sim/time/total_flight_time_sec',
  heading: 'sim/flightmodel/position/hpath',
  distance: 'sim/flightmodel/controls/dist',
  fuelQuantity: 'sim/cockpit2/fuel/fuel_quantity',
  latitude: 'sim/flightmodel/position/latitude',
  longitude: 'sim/flightmodel/position/longitude',
  elevation: 'sim/flightmodel/position/elevation',
};

export type DatarefReader = (dataref: string, index: number) => unknown;

/**
 * Adapts a host's string-keyed dataref accessor to the typed signal source.
 * Scalar signals read index 0; the engine-running flag follows engine 1.
 */
export class DatarefSignalSource implements SignalSource {
  constructor(
    private readonly readDataref: DatarefReader,
    private readonly datarefs: Record<SignalName, string> = XPLANE_DATAREFS,
  ) {}

  read(signal: SignalName, index = 0): number | undefined {
    const raw = this.readDataref(this.datarefs[signal], index);
    if (typeof raw === 'boolean') {
      return raw ? 1 : 0;
    }
    return typeof raw === 'number' ? raw : undefined;
  }
}
