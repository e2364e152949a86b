export {
	axisRange,
	type Coordinates,
	type CoordinatesInput,
	coordinateRange,
	type Point,
	toCoordinates,
} from "./coords.ts";
export { pcRotate } from "./pc-rotate.ts";
