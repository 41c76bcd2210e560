import { MongoClient, Db, Collection, ObjectId, type Filter, type WithId } from "mongodb";
import { config } from "../server/config.js";
import type { Inquiry, Region, UserPreference, Vendor, VendorInput } from "../core/schemas.js";
import { escapeRegex, type PlannerStore, type StoreStatus, type VendorFilter } from "./store.js";

export type PreferenceDoc = UserPreference & {
  _id?: ObjectId;
  createdAt: Date;
};

export type VendorDoc = VendorInput & {
  _id?: ObjectId;
  createdAt?: Date;
};

export type InquiryDoc = Inquiry & {
  _id?: ObjectId;
  createdAt: Date;
};

let client: MongoClient;
let db: Db;

export const collections = {} as {
  preferences: Collection<PreferenceDoc>;
  vendors: Collection<VendorDoc>;
  inquiries: Collection<InquiryDoc>;
};

export async function connectMongo() {
  client = new MongoClient(config.mongoUri);
  await client.connect();
  db = client.db(config.mongoDb);

  // collection names follow the lowercase model names
  collections.preferences = db.collection<PreferenceDoc>("userpreference");
  collections.vendors = db.collection<VendorDoc>("vendor");
  collections.inquiries = db.collection<InquiryDoc>("inquiry");

  // indexes
  await collections.vendors.createIndex({ region: 1, category: 1 });
  await collections.vendors.createIndex({ name: 1, region: 1 });
  await collections.preferences.createIndex({ createdAt: -1 });

  return db;
}

export async function closeMongo() {
  await client?.close();
}

export function toVendor(doc: WithId<VendorDoc>): Vendor {
  return {
    id: String(doc._id),
    name: doc.name,
    category: doc.category,
    region: doc.region,
    city: doc.city ?? undefined,
    description: doc.description ?? undefined,
    languages: Array.isArray(doc.languages) ? doc.languages : [],
    price_tier: doc.price_tier ?? "$$",
    average_price_usd: typeof doc.average_price_usd === "number" ? doc.average_price_usd : undefined,
    capacity: typeof doc.capacity === "number" ? doc.capacity : undefined,
    images: Array.isArray(doc.images) ? doc.images : [],
    contact_phone: doc.contact_phone ?? undefined,
    contact_email: doc.contact_email ?? undefined,
    website: doc.website ?? undefined,
    instagram: doc.instagram ?? undefined,
    featured: !!doc.featured,
  };
}

export function vendorQuery(filter: VendorFilter): Filter<VendorDoc> {
  const query: Filter<VendorDoc> = {};
  if (filter.region) query.region = filter.region;
  if (filter.category) query.category = filter.category;
  if (filter.featured !== undefined) query.featured = filter.featured;
  if (filter.price_tier) query.price_tier = filter.price_tier;
  if (filter.city) query.city = { $regex: `^${escapeRegex(filter.city)}$`, $options: "i" };
  if (filter.min_capacity !== undefined) query.capacity = { $gte: filter.min_capacity };
  if (filter.q) {
    const pattern = escapeRegex(filter.q);
    query.$or = [
      { name: { $regex: pattern, $options: "i" } },
      { description: { $regex: pattern, $options: "i" } },
    ];
  }
  return query;
}

export function createMongoStore(): PlannerStore {
  return {
    async insertPreference(pref: UserPreference) {
      const result = await collections.preferences.insertOne({ ...pref, createdAt: new Date() });
      return String(result.insertedId);
    },

    async insertInquiry(inquiry: Inquiry) {
      const result = await collections.inquiries.insertOne({ ...inquiry, createdAt: new Date() });
      return String(result.insertedId);
    },

    async findVendors(filter: VendorFilter, limit: number) {
      const docs = await collections.vendors.find(vendorQuery(filter)).limit(limit).toArray();
      return docs.map(toVendor);
    },

    async findVendorByName(name: string, region: Region) {
      const doc = await collections.vendors.findOne({ name, region });
      return doc ? toVendor(doc) : null;
    },

    async insertVendor(vendor: VendorInput) {
      const result = await collections.vendors.insertOne({ ...vendor, createdAt: new Date() });
      return String(result.insertedId);
    },

    async countVendors() {
      return collections.vendors.countDocuments({});
    },

    async status(): Promise<StoreStatus> {
      if (!db) return { connected: false, database: config.mongoDb, collections: [] };
      try {
        const list = await db.listCollections({}, { nameOnly: true }).toArray();
        return {
          connected: true,
          database: db.databaseName,
          collections: list.map((c) => c.name).slice(0, 10),
        };
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        return { connected: true, database: db.databaseName, collections: [], error: message.slice(0, 80) };
      }
    },
  };
}
