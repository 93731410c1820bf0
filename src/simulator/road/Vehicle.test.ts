import { describe, it, expect } from "vitest";
import { createDefaultConfig } from "@/simulator/types";
import { Vehicle, vehicleParamsFromConfig } from "./Vehicle";

const params = vehicleParamsFromConfig(createDefaultConfig());

const makeVehicle = (x = 0, v?: number, path: number[] = [0]) =>
  new Vehicle({ id: 1, path, spawnTime: 2, params, x, v });

describe("Vehicle (IDM)", () => {
  it("cruises at max speed on a free road", () => {
    const vehicle = makeVehicle(0);
    vehicle.update(undefined, 0.5, 0);

    expect(vehicle.v).toBeCloseTo(16.6, 10);
    expect(vehicle.x).toBeCloseTo(8.3, 10);
    expect(vehicle.a).toBeCloseTo(0, 10);
    expect(vehicle.waitingSince).toBeNull();
  });

  it("accelerates from rest and tracks standstill time", () => {
    const vehicle = makeVehicle(0, 0);
    vehicle.update(undefined, 1, 3);

    expect(vehicle.a).toBeCloseTo(1.44, 10);
    expect(vehicle.waitingSince).toBe(3);
    expect(vehicle.getCurrentWaitingTime(4.5)).toBeCloseTo(1.5, 10);

    vehicle.update(undefined, 1, 4);
    expect(vehicle.v).toBeCloseTo(1.44, 10);
    expect(vehicle.x).toBeCloseTo(2.16, 10);
    expect(vehicle.waitingSince).toBeNull();
    expect(vehicle.getCurrentWaitingTime(5)).toBe(0);
  });

  it("brakes hard behind a stationary lead", () => {
    const lead = makeVehicle(20, 0);
    const follower = makeVehicle(0, 10);
    follower.update(lead, 0, 0);

    expect(follower.a).toBeCloseTo(-5.02696, 4);
  });

  it("decelerates proportionally to speed when stopped", () => {
    const vehicle = makeVehicle(0, 10);
    vehicle.stop();
    vehicle.update(undefined, 0.1, 0);

    expect(vehicle.x).toBeCloseTo(1, 10);
    expect(vehicle.a).toBeCloseTo(-2.77711, 4);

    vehicle.unstop();
    expect(vehicle.stopped).toBe(false);
  });

  it("never reverses: overshooting deceleration clamps speed to zero", () => {
    const vehicle = makeVehicle(0, 1);
    vehicle.a = -20;
    vehicle.update(undefined, 0.1, 0);

    expect(vehicle.v).toBe(0);
    expect(vehicle.x).toBeCloseTo(0.025, 10);
  });

  it("slow and unslow change the speed limit", () => {
    const vehicle = makeVehicle();
    vehicle.slow(6.64);
    expect(vehicle.currentMaxSpeed).toBe(6.64);
    vehicle.unslow();
    expect(vehicle.currentMaxSpeed).toBe(16.6);
  });

  it("measures journey time from spawn", () => {
    expect(makeVehicle().getTotalWaitingTime(12.5)).toBeCloseTo(10.5, 10);
  });

  it("handOff moves the vehicle to the start of the next road", () => {
    const vehicle = makeVehicle(12, 5, [3, 5]);
    vehicle.stop();
    vehicle.slow(4);
    vehicle.position.set(1, 2);

    expect(vehicle.currentRoadIndex).toBe(3);
    expect(vehicle.hasNextRoad()).toBe(true);

    const moved = vehicle.handOff();
    expect(moved).not.toBe(vehicle);
    expect(moved.id).toBe(1);
    expect(moved.currentRoadIndex).toBe(5);
    expect(moved.hasNextRoad()).toBe(false);
    expect(moved.x).toBe(0);
    expect(moved.v).toBe(5);
    expect(moved.stopped).toBe(true);
    expect(moved.currentMaxSpeed).toBe(4);
    expect(moved.spawnTime).toBe(2);
    expect(moved.position).not.toBe(vehicle.position);
    expect(moved.position.toArray()).toEqual([1, 2]);
  });
});
