import {
  Arc,
  DirectJunctionCreator,
  JunctionCreator,
  LaneDef,
  Line,
  OpenDrive,
  Spiral,
  createRoad,
} from "@shared";

export type ExampleBuilder = () => OpenDrive;

/** Positions every road, then fills in missing elevations and lines up broken marks */
export function adjustNetwork(network: OpenDrive): OpenDrive {
  network.adjustRoadsAndLanes();
  network.adjustElevations();
  network.adjustRoadmarks();
  return network;
}

/** Climbing straight, banked curve, level straight */
function twoRoads(): OpenDrive {
  const first = createRoad(new Line(100), 1).addSuccessor("road", 2, "start").addElevation(0, 0, 0.02, 0, 0);
  const curve = createRoad(new Arc(0.01, { angle: Math.PI / 2 }), 2)
    .addPredecessor("road", 1, "end")
    .addSuccessor("road", 3, "start")
    .addSuperelevation(0, 0.05, 0, 0, 0);
  const last = createRoad(new Line(100), 3).addPredecessor("road", 2, "end").addElevation(0, 5, 0, 0, 0);
  return new OpenDrive("two-roads").addRoad(first).addRoad(curve).addRoad(last);
}

function threeWayJunction(): OpenDrive {
  const roads = [1, 2, 3].map((id) => createRoad(new Line(100), id));
  const creator = new JunctionCreator(1, "three-way")
    .addIncomingRoadCircular(roads[0], 20, 0, "successor")
    .addIncomingRoadCircular(roads[1], 20, Math.PI / 2, "predecessor")
    .addIncomingRoadCircular(roads[2], 20, Math.PI, "predecessor")
    .addConnection(1, 2)
    .addConnection(1, 3)
    .addConnection(2, 3);

  const network = new OpenDrive("three-way-junction");
  for (const road of roads) network.addRoad(road);
  return network.addJunctionCreator(creator);
}

/** Three lanes splitting into a two-lane highway and a one-lane exit ramp */
function highwayExit(): OpenDrive {
  const highway = createRoad(new Line(200), 1, { rightLanes: 3 }).addSuccessor("junction", 100);
  const through = createRoad(new Line(200), 2, { rightLanes: 2 }).addPredecessor("junction", 100);
  const exit = createRoad(
    [new Spiral(0, -0.02, { length: 40 }), new Arc(-0.02, { angle: -Math.PI / 4 })],
    3,
    { rightLanes: 1 }
  ).addPredecessor("junction", 100);

  const junction = new DirectJunctionCreator(100, "exit")
    .addConnection(highway, through, [-1, -2], [-1, -2])
    .addConnection(highway, exit, -3, -1);

  return new OpenDrive("highway-exit")
    .addRoad(highway)
    .addRoad(through)
    .addRoad(exit)
    .addJunctionCreator(junction);
}

/** Two right lanes merging into one halfway along the middle road */
function laneMerge(): OpenDrive {
  const before = createRoad(new Line(100), 1, { rightLanes: 2 }).addSuccessor("road", 2, "start");
  const merge = createRoad(new Line(100), 2, { rightLanes: [new LaneDef(30, 70, 2, 1, -2)] })
    .addPredecessor("road", 1, "end")
    .addSuccessor("road", 3, "start");
  const after = createRoad(new Line(100), 3).addPredecessor("road", 2, "end");
  return new OpenDrive("lane-merge").addRoad(before).addRoad(merge).addRoad(after);
}

export const examples: ReadonlyMap<string, ExampleBuilder> = new Map<string, ExampleBuilder>([
  ["two-roads", twoRoads],
  ["three-way-junction", threeWayJunction],
  ["highway-exit", highwayExit],
  ["lane-merge", laneMerge],
]);
