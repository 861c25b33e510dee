/**
 * Failures raised by the road network builder.
 * Every error is thrown synchronously by the call that detected it.
 */
export class OpenDriveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A constructor was called without a required optional argument */
export class NotEnoughInputArguments extends OpenDriveError {}

/** Mutually exclusive optional arguments were combined */
export class ToManyOptionalArguments extends OpenDriveError {}

/** addGeometry and addFixedGeometry were mixed on one plan view */
export class MixOfGeometryAddition extends OpenDriveError {}

/** The road graph cannot be positioned from the available anchors */
export class UndefinedRoadNetwork extends OpenDriveError {}

export class NotSameAmountOfLanesError extends OpenDriveError {}

export class RoadsAndLanesNotAdjusted extends OpenDriveError {}

export class IdAlreadyExists extends OpenDriveError {}

/** Predecessor/successor declarations of two roads contradict each other */
export class MixingDrivingDirection extends OpenDriveError {}

export class GeneralIssueInputArguments extends OpenDriveError {}
