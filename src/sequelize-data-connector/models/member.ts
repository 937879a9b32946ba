import { sequelize } from "../connection";
import { DataTypes, Model } from "sequelize";
import { IMember, IMemberFields } from "../../base-data-connector";

export const Member = sequelize.define<Model<IMember, IMemberFields>, IMemberFields>('member', {
    firstName: { type: DataTypes.STRING(50), allowNull: false },
    lastName: { type: DataTypes.STRING(50), allowNull: false },
    email: { type: DataTypes.STRING(100), allowNull: false, unique: true },
    phone: { type: DataTypes.STRING(15), allowNull: true },
    address: { type: DataTypes.TEXT, allowNull: true },
    membershipDate: { type: DataTypes.DATE, allowNull: false },
    status: { type: DataTypes.ENUM, values: ["active", "inactive"], allowNull: false, defaultValue: "active" },
});
