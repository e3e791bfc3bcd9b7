export const bottleSpecification = {
  productId: "bottle-500ml",
  productName: "Simple bottle",
  materials: [{ materialId: "PP", massKg: 0.15, recycledContent: 0 }],
  processes: [{ processId: "Injection Molding", efficiency: 0.85 }],
  manufacturingRegion: "Global Average",
  transportLegs: [{ modeId: "Truck", distanceKm: 1000, loadFactor: 0.8 }],
  useScenarios: [],
  lifetimeYears: 2,
  endOfLife: { recyclingRate: 0.7, incinerationRate: 0.2, landfillRate: 0.1 },
};
