import type { NamedQuery, TableSchema } from '@polystore/gateway'

/** Order table the built-in analytics read from. */
export const SALES_SCHEMA: TableSchema = {
  table: 'sales',
  columns: [
    { name: 'order_id', type: 'int' },
    { name: 'product_name', type: 'string' },
    { name: 'category', type: 'string' },
    { name: 'quantity', type: 'int' },
    { name: 'price', type: 'decimal' },
    { name: 'order_date', type: 'date' },
    { name: 'region', type: 'string' },
  ],
  orderBy: ['order_date', 'order_id'],
}

export const BUILTIN_NAMED_QUERIES: readonly NamedQuery[] = [
  {
    name: 'total-by-category',
    description: 'Revenue, order count and average price per category',
    sql: `SELECT category,
       sum(quantity * price) AS total_revenue,
       count() AS order_count,
       avg(price) AS avg_price
FROM sales
GROUP BY category
ORDER BY total_revenue DESC`,
  },
  {
    name: 'total-by-region',
    description: 'Revenue and units sold per region',
    sql: `SELECT region,
       sum(quantity * price) AS total_revenue,
       sum(quantity) AS total_quantity
FROM sales
GROUP BY region
ORDER BY total_revenue DESC`,
  },
  {
    name: 'top-products',
    description: 'Best-selling products by revenue',
    sql: `SELECT product_name,
       sum(quantity) AS total_sold,
       sum(quantity * price) AS revenue
FROM sales
GROUP BY product_name
ORDER BY revenue DESC
LIMIT {limit:UInt32}`,
    params: { limit: { type: 'int', default: 5 } },
  },
]
