import { sequelize } from "../connection";
import { DataTypes, Model } from "sequelize";
import { IBorrowing, IBorrowingFields } from "../../base-data-connector";

export const Borrowing = sequelize.define<Model<IBorrowing, IBorrowingFields>, IBorrowingFields>('borrowing', {
    memberId: { type: DataTypes.INTEGER, allowNull: false, references: { model: "members", key: "id" } },
    bookId: { type: DataTypes.INTEGER, allowNull: false, references: { model: "books", key: "id" } },
    borrowDate: { type: DataTypes.DATE, allowNull: false },
    dueDate: { type: DataTypes.DATE, allowNull: false },
    returnDate: { type: DataTypes.DATE, allowNull: true },
    status: { type: DataTypes.ENUM, values: ["borrowed", "returned"], allowNull: false, defaultValue: "borrowed" },
});
