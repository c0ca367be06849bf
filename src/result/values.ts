/**
 * Property value decoding: typed `Properties` maps and the legacy
 * Struct-plus-typed-arrays encoding both end up as a plain {@link Properties} bag.
 */

import { unpackFloat64, unpackInt64 } from "../proto/packing";
import type {
  ListValue,
  NumberArrayProperties,
  ObjectPropertiesValue,
  PhoneNumberValue,
  PropertiesResult,
  PropertiesValue,
  Struct,
  StructValue,
  Value,
} from "../proto/schema";
import type { PhoneNumber, Properties, PropertyValue } from "../types";
import { setOwn } from "./records";

/** Decides, per top-level property name, whether a blob value is kept. */
export type BlobPolicy = (name: string) => boolean;

// =============================================================================
// Typed values
// =============================================================================

function phoneNumber(phone: PhoneNumberValue): PhoneNumber {
  const out: PhoneNumber = { number: phone.input ?? "" };
  if (phone.countryCode !== undefined) out.countryCode = phone.countryCode;
  if (phone.defaultCountry !== undefined) out.defaultCountry = phone.defaultCountry;
  if (phone.internationalFormatted !== undefined) out.internationalFormatted = phone.internationalFormatted;
  if (phone.national !== undefined) out.national = phone.national;
  if (phone.nationalFormatted !== undefined) out.nationalFormatted = phone.nationalFormatted;
  if (phone.valid !== undefined) out.valid = phone.valid;
  return out;
}

function listValue(list: ListValue): PropertyValue[] {
  if (list.numberValues) return list.numberValues.values ? unpackFloat64(list.numberValues.values) : [];
  if (list.intValues) return list.intValues.values ? unpackInt64(list.intValues.values) : [];
  if (list.boolValues) return list.boolValues.values;
  if (list.textValues) return list.textValues.values;
  if (list.uuidValues) return list.uuidValues.values;
  if (list.dateValues) return list.dateValues.values.map((d) => new Date(d));
  if (list.objectValues) return list.objectValues.values.map((v) => decodeProperties(v));
  return list.values.map(value);
}

/** The single member of the `kind` oneof; an empty value decodes to null. */
function value(v: Value): PropertyValue {
  if (v.textValue !== undefined) return v.textValue;
  if (v.stringValue !== undefined) return v.stringValue;
  if (v.intValue !== undefined) return v.intValue;
  if (v.numberValue !== undefined) return v.numberValue;
  if (v.boolValue !== undefined) return v.boolValue;
  if (v.dateValue !== undefined) return new Date(v.dateValue);
  if (v.uuidValue !== undefined) return v.uuidValue;
  if (v.blobValue !== undefined) return v.blobValue;
  if (v.geoValue !== undefined) return { latitude: v.geoValue.latitude, longitude: v.geoValue.longitude };
  if (v.phoneValue !== undefined) return phoneNumber(v.phoneValue);
  if (v.objectValue !== undefined) return decodeProperties(v.objectValue);
  if (v.listValue !== undefined) return listValue(v.listValue);
  return null;
}

export function decodeProperties(props: PropertiesValue, keepBlob?: BlobPolicy): Properties {
  const out: Properties = {};
  for (const [name, v] of Object.entries(props.fields)) {
    if (v.blobValue !== undefined && keepBlob && !keepBlob(name)) continue;
    setOwn(out, name, value(v));
  }
  return out;
}

// =============================================================================
// Legacy encoding
// =============================================================================

function structValue(v: StructValue): PropertyValue {
  if (v.stringValue !== undefined) return v.stringValue;
  if (v.numberValue !== undefined) return v.numberValue;
  if (v.boolValue !== undefined) return v.boolValue;
  if (v.structValue !== undefined) return struct(v.structValue);
  if (v.listValue !== undefined) return v.listValue.values.map(structValue);
  return null;
}

function struct(s: Struct): Properties {
  const out: Properties = {};
  for (const [name, v] of Object.entries(s.fields)) {
    setOwn(out, name, structValue(v));
  }
  return out;
}

function numberArray(array: NumberArrayProperties): number[] {
  return array.valuesBytes && array.valuesBytes.byteLength > 0 ? unpackFloat64(array.valuesBytes) : array.values;
}

type LegacyProperties = Omit<ObjectPropertiesValue, "emptyListProps"> & { emptyListProps?: string[] };

function legacy(source: LegacyProperties): Properties {
  const out: Properties = source.nonRefProperties ? struct(source.nonRefProperties) : {};
  for (const name of source.emptyListProps ?? []) setOwn(out, name, []);
  for (const a of source.numberArrayProperties) setOwn(out, a.propName, numberArray(a));
  for (const a of source.intArrayProperties) setOwn(out, a.propName, a.values);
  for (const a of source.textArrayProperties) setOwn(out, a.propName, a.values);
  for (const a of source.booleanArrayProperties) setOwn(out, a.propName, a.values);
  for (const o of source.objectProperties) setOwn(out, o.propName, o.value ? legacy(o.value) : null);
  for (const o of source.objectArrayProperties) setOwn(out, o.propName, o.values.map(legacy));
  return out;
}

/**
 * Non-reference properties of one result: the typed map when the server sent
 * one, otherwise the legacy encoding.
 */
export function decodeResultProperties(result: PropertiesResult, keepBlob?: BlobPolicy): Properties {
  if (result.nonRefProps) {
    return decodeProperties(result.nonRefProps, keepBlob);
  }
  return legacy(result);
}
