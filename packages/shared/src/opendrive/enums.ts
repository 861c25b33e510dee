// Value sets used in OpenDRIVE attributes

export type ContactPoint = 'start' | 'end';
export type ElementType = 'road' | 'junction';
export type LinkType = 'predecessor' | 'successor';
export type NeighborDirection = 'same' | 'opposite';
export type NeighborSide = 'left' | 'right';

export type LaneType =
  | 'none'
  | 'driving'
  | 'stop'
  | 'shoulder'
  | 'biking'
  | 'sidewalk'
  | 'border'
  | 'restricted'
  | 'parking'
  | 'bidirectional'
  | 'median'
  | 'curb'
  | 'entry'
  | 'exit'
  | 'onRamp'
  | 'offRamp'
  | 'connectingRamp';

export type RoadMarkType =
  | 'none'
  | 'solid'
  | 'broken'
  | 'solid solid'
  | 'solid broken'
  | 'broken solid'
  | 'broken broken'
  | 'botts dots'
  | 'grass'
  | 'curb'
  | 'custom'
  | 'edge';

export type RoadMarkWeight = 'standard' | 'bold';
export type RoadMarkColor = 'standard' | 'blue' | 'green' | 'red' | 'white' | 'yellow' | 'orange';
export type MarkRule = 'no passing' | 'caution' | 'none';
export type LaneChange = 'increase' | 'decrease' | 'both' | 'none';

export type RoadType =
  | 'unknown'
  | 'rural'
  | 'motorway'
  | 'town'
  | 'lowSpeed'
  | 'pedestrian'
  | 'bicycle'
  | 'townExpressway'
  | 'townCollector'
  | 'townArterial'
  | 'townPrivate'
  | 'townLocal'
  | 'townPlayStreet';

export type SpeedUnit = 'm/s' | 'mph' | 'kph';
export type TrafficRule = 'RHT' | 'LHT';

export type JunctionType = 'default' | 'direct' | 'virtual';
export type JunctionGroupType = 'roundabout' | 'unknown';
export type Orientation = '+' | '-' | 'none';

export type ObjectType =
  | 'none'
  | 'obstacle'
  | 'pole'
  | 'tree'
  | 'vegetation'
  | 'barrier'
  | 'building'
  | 'parkingSpace'
  | 'trafficIsland'
  | 'crosswalk'
  | 'gantry'
  | 'roadMark'
  | 'streetLamp';

export type Dynamic = 'yes' | 'no';
export type ParamPoly3Range = 'normalized' | 'arcLength';

/** Per-domain adjustment state of a road */
export type AdjustmentState = 'unadjusted' | 'adjusted';
export type AdjustmentDomain = 'planview' | 'elevation' | 'superelevation' | 'shape';
