// Geometry and reference line
export * from './geometry';
export * from './planview';
export * from './clothoid';
export * from './numeric';

// Lanes
export * from './lane';
export * from './lane-def';
export * from './road-marks';
export * from './links';
export * from './lane-linking';

// Roads, junctions and the network
export * from './elevation';
export * from './signals-objects';
export * from './road';
export * from './junction';
export * from './junction-creator';
export * from './generators';
export * from './network';
export * from './elevation-adjuster';
export * from './roadmark-adjuster';
export * from './opendrive';

export * from './enums';
export * from './xml';
