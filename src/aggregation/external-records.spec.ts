import {
	EquipmentRecord,
	RentalRequestRecord,
	toProfileRecord,
	toRecord,
} from "./external-records";

describe("external records", () => {
	it("should coerce scalars to strings and drop unknown keys", () => {
		const request = toRecord(RentalRequestRecord, {
			id: 42,
			status: "active",
			quantity: 2,
			total_price: "150.00",
			internal_flag: true,
		});

		expect(request).toEqual({
			id: "42",
			status: "active",
			quantity: "2",
			total_price: "150.00",
			start_date: undefined,
			end_date: undefined,
		});
	});

	it("should reject bodies that are not objects", () => {
		expect(toRecord(EquipmentRecord, "Drill")).toBeNull();
		expect(toRecord(EquipmentRecord, null)).toBeNull();
		expect(toRecord(EquipmentRecord, [{ stuffname: "Drill" }])).toBeNull();
	});

	it("should take the first profile of a list", () => {
		const profile = toProfileRecord([
			{ first_name: "Amal", address: { city: "Sfax", postal_code: 3000 } },
			{ first_name: "Other" },
		]);

		expect(profile?.first_name).toBe("Amal");
		expect(profile?.address?.city).toBe("Sfax");
		expect(profile?.address?.postal_code).toBe("3000");
	});

	it("should treat an empty profile list as absent", () => {
		expect(toProfileRecord([])).toBeNull();
	});

	it("should drop an address that is not an object", () => {
		const profile = toProfileRecord({ first_name: "Amal", address: "Sfax" });
		expect(profile?.first_name).toBe("Amal");
		expect(profile?.address).toBeUndefined();
	});
});
