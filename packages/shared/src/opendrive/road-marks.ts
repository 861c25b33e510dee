import { RoadLine, RoadMark } from './lane';

// Common lane markings. Line records are (width, length, space, tOffset, sOffset).

export function solidRoadMark(): RoadMark {
  return new RoadMark('solid', { width: 0.2 });
}

export function brokenRoadMark(): RoadMark {
  return new RoadMark('broken', { width: 0.2 }).addSpecificRoadLine(new RoadLine(0.15, 3, 9, 0, 0));
}

export function brokenLongLineRoadMark(): RoadMark {
  return new RoadMark('broken', { width: 0.2 }).addSpecificRoadLine(new RoadLine(0.15, 9, 3, 0, 0));
}

export function brokenTightRoadMark(): RoadMark {
  return new RoadMark('broken', { width: 0.2 }).addSpecificRoadLine(new RoadLine(0.15, 3, 3, 0, 0));
}

export function brokenBrokenRoadMark(): RoadMark {
  return new RoadMark('broken broken')
    .addSpecificRoadLine(new RoadLine(0.2, 3, 3, 0.2, 0))
    .addSpecificRoadLine(new RoadLine(0.2, 3, 3, -0.2, 0));
}

export function solidSolidRoadMark(): RoadMark {
  return new RoadMark('solid solid')
    .addSpecificRoadLine(new RoadLine(0.2, 0, 0, 0.2, 0))
    .addSpecificRoadLine(new RoadLine(0.2, 0, 0, -0.2, 0));
}

export function solidBrokenRoadMark(): RoadMark {
  return new RoadMark('solid broken')
    .addSpecificRoadLine(new RoadLine(0.2, 0, 0, 0.2, 0))
    .addSpecificRoadLine(new RoadLine(0.2, 3, 3, -0.2, 0));
}

export function brokenSolidRoadMark(): RoadMark {
  return new RoadMark('broken solid')
    .addSpecificRoadLine(new RoadLine(0.2, 0, 0, -0.2, 0))
    .addSpecificRoadLine(new RoadLine(0.2, 3, 3, 0.2, 0));
}
