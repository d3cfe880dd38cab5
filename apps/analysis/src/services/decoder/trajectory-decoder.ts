import { DecodeError, fail, isGeoFeature, ok, toRideState } from '@rail-trace/domain';
import type { Coordinate, Envelope, Line, PositionRecord, Result, Train } from '@rail-trace/domain';
import { jsonKindOf } from './json-kind.js';
import { asInteger, asString, PropertyBag, toPropertyBag } from './property-bag.js';
import { parseHexColor } from './color.js';

function capture<T>(decode: () => T): Result<T, DecodeError> {
  try {
    return ok(decode());
  } catch (err) {
    if (err instanceof DecodeError) return fail(err);
    throw err;
  }
}

/** `[longitude, latitude]`, exactly two numbers. */
export function decodeCoordinate(value: unknown): Coordinate {
  if (!Array.isArray(value)) throw DecodeError.incorrectType('array', jsonKindOf(value));
  if (value.length !== 2) throw DecodeError.missingItems(2, value.length);

  const [longitude, latitude]: unknown[] = value;
  if (typeof longitude !== 'number') throw DecodeError.incorrectType('number', jsonKindOf(longitude));
  if (typeof latitude !== 'number') throw DecodeError.incorrectType('number', jsonKindOf(latitude));
  return { latitude, longitude };
}

export function decodeLine(value: unknown): Line {
  const line = toPropertyBag(value);
  return {
    color: line.required('color', asString),
    id: line.required('id', asInteger),
    name: line.required('name', asString),
    stroke: line.required('stroke', asString),
    textColor: line.required('text_color', asString),
  };
}

/** Properties of the single feature carried by a trajectory_schematic envelope. */
function trajectoryProperties(envelope: Envelope): PropertyBag {
  const { payload } = envelope;
  if (payload.source !== 'trajectory_schematic') {
    throw DecodeError.incorrectType('trajectory_schematic', payload.source);
  }
  const geo = payload.content;
  if (!isGeoFeature(geo)) throw DecodeError.incorrectType('Feature', geo.type);
  if (geo.properties === null) throw DecodeError.incorrectType('properties', 'null');
  return new PropertyBag(geo.properties);
}

/** Stage 2, statistics projection: every known trajectory property. */
export function decodeTrain(envelope: Envelope): Result<Train, DecodeError> {
  return capture(() => {
    const props = trajectoryProperties(envelope);
    return {
      delay: props.optional('delay', asString),
      hasJourney: props.flag('has_journey'),
      hasRealtime: props.flag('has_realtime'),
      hasRealtimeJourney: props.flag('has_realtime_journey'),
      line: props.optionalWith('line', decodeLine),
      operatorProvidesRealtimeJourney: props.required('operator_provides_realtime_journey', asString),
      originalLine: props.optional('original_line', asString),
      originalRake: props.optional('original_rake', asString),
      rake: props.optional('rake', asString),
      rawCoordinates: props.optionalWith('raw_coordinates', decodeCoordinate),
      rideState: props.optional('ride_state', asString),
      state: props.optional('state', asString),
      tenant: props.required('tenant', asString),
      trainId: props.required('train_id', asString),
      trainNumber: props.optional('train_number', asInteger),
      transmittingVehicle: props.optional('transmitting_vehicle', asString),
      vehicleNumber: props.optional('vehicle_number', asString),
    };
  });
}

/** Stage 2, replay projection: position, line and identity of one sample. */
export function decodePositionRecord(envelope: Envelope): Result<PositionRecord, DecodeError> {
  return capture(() => {
    const props = trajectoryProperties(envelope);
    const position = props.requiredWith('raw_coordinates', decodeCoordinate);
    const line = props.requiredWith('line', toPropertyBag);
    const lineName = line.required('name', asString);

    const color = parseHexColor(line.required('color', asString));
    if (!color.ok) throw DecodeError.incorrectType('Color', color.error.message);

    return {
      timestamp: envelope.timestamp,
      position,
      lineName,
      lineColor: color.value,
      rideState: toRideState(props.required('state', asString)),
      vehicleNumber: props.required('vehicle_number', asString),
      trainNumber: props.required('train_number', asInteger),
    };
  });
}
